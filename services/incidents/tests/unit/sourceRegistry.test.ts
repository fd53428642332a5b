import assert from 'node:assert/strict';
import { test } from 'node:test';
import { UnknownSourceKindError } from '../../src/errors/domain';
import { extractPrefix, listSources, resolve, resolveBatch } from '../../src/sources/registry';

test('extracts the prefix before the first separator', () => {
  assert.equal(extractPrefix('asrs_123456'), 'asrs');
  assert.equal(extractPrefix('pci_2019_04'), 'pci');
  assert.equal(extractPrefix('noseparator'), null);
});

test('resolves each registered prefix to its table', () => {
  assert.equal(resolve('asn_1').table, 'asn_scraped_accidents');
  assert.equal(resolve('asrs_1').table, 'asrs_records');
  assert.equal(resolve('pci_1').table, 'pci_scraped_accidents');
});

test('maps asrs canonical fields onto its native columns', () => {
  const source = resolve('asrs_42');
  assert.equal(source.kind, 'asrs');
  assert.equal(source.columns.date, 'time');
  assert.equal(source.columns.location, 'place');
  assert.equal(source.columns.narrative, 'synopsis');
});

test('projects pci phase as missing', () => {
  assert.equal(resolve('pci_7').columns.phase, null);
});

test('rejects identifiers with an unknown prefix', () => {
  assert.throws(() => resolve('ntsb_99'), (error: unknown) => {
    assert(error instanceof UnknownSourceKindError);
    assert.equal(error.identifier, 'ntsb_99');
    assert.equal(error.prefix, 'ntsb');
    assert.equal(error.message, 'Unsupported source prefix "ntsb" in identifier "ntsb_99"');
    return true;
  });
});

test('rejects identifiers without a prefix', () => {
  assert.throws(() => resolve('12345'), (error: unknown) => {
    assert(error instanceof UnknownSourceKindError);
    assert.equal(error.prefix, null);
    assert.equal(error.message, 'Identifier "12345" has no source prefix');
    return true;
  });
});

test('lists sources in registry order', () => {
  assert.deepEqual(
    listSources().map((source) => source.kind),
    ['asn', 'asrs', 'pci']
  );
});

test('partitions a batch by source and collects unknown identifiers once', () => {
  const batch = resolveBatch(['asrs_1', 'pci_2', 'asrs_3', 'bogus', 'asrs_1', 'bogus', 'xyz_9']);
  assert.deepEqual(Array.from(batch.partitions.keys()), ['asrs', 'pci']);
  assert.deepEqual(Array.from(batch.partitions.get('asrs') ?? []), ['asrs_1', 'asrs_3']);
  assert.deepEqual(Array.from(batch.partitions.get('pci') ?? []), ['pci_2']);
  assert.deepEqual(batch.unknown, ['bogus', 'xyz_9']);
});
