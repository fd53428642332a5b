import assert from 'node:assert/strict';
import { test } from 'node:test';
import { lookupAirports, normalizeAirportCodes } from '../../src/airports/airportDirectory';
import { RecordingClient } from '../utils/recordingClient';

test('normalizes codes to unique lower-case values', () => {
  assert.deepEqual(normalizeAirportCodes([' KJFK', 'kjfk', '', 'LAX ']), ['kjfk', 'lax']);
});

test('runs no query for an empty request', async () => {
  const client = new RecordingClient();
  const found = await lookupAirports(client, ['  ']);
  assert.equal(found.size, 0);
  assert.equal(client.queries.length, 0);
});

test('matches ICAO or IATA codes case-insensitively', async () => {
  const client = new RecordingClient([
    [
      { icao_code: 'KJFK', iata_code: 'JFK', name: 'Kennedy', city: 'New York', country: 'US', lat: '40.64', lon: '-73.78' },
      { icao_code: 'KLAX', iata_code: 'LAX', name: 'Los Angeles', city: 'Los Angeles', country: 'US', lat: 33.94, lon: -118.41 }
    ]
  ]);

  const found = await lookupAirports(client, ['kjfk', 'LAX', 'ZZZZ']);

  assert.deepEqual(client.queries[0]?.values, [['kjfk', 'lax', 'zzzz']]);
  assert.deepEqual(Array.from(found.keys()), ['kjfk', 'lax']);
  assert.deepEqual(found.get('kjfk'), {
    icaoCode: 'KJFK',
    iataCode: 'JFK',
    name: 'Kennedy',
    city: 'New York',
    country: 'US',
    lat: 40.64,
    lon: -73.78
  });
  assert.equal(found.get('lax')?.icaoCode, 'KLAX');
});

test('prefers an ICAO match over an IATA match for the same code', async () => {
  const client = new RecordingClient([
    [
      { icao_code: 'XABC', iata_code: 'ABCD', name: 'By IATA', city: null, country: null, lat: 1, lon: 1 },
      { icao_code: 'ABCD', iata_code: 'ABD', name: 'By ICAO', city: null, country: null, lat: 2, lon: 2 }
    ]
  ]);
  const found = await lookupAirports(client, ['abcd']);
  assert.equal(found.get('abcd')?.name, 'By ICAO');
});
