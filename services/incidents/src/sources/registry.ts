import { UnknownSourceKindError } from '../errors/domain';

export const SOURCE_KINDS = ['asn', 'asrs', 'pci'] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export const CANONICAL_FIELDS = [
  'uid',
  'date',
  'phase',
  'aircraft_type',
  'location',
  'operator',
  'narrative'
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/**
 * Native column backing each canonical field. `null` means the source does
 * not record the field and it is projected as SQL NULL.
 */
export type CanonicalColumnMap = Readonly<Record<CanonicalField, string | null>>;

export type SourceDefinition = Readonly<{
  kind: SourceKind;
  table: string;
  columns: CanonicalColumnMap;
  /** DATE column used for period filtering and time bucketing. */
  periodColumn: string;
}>;

export const IDENTIFIER_SEPARATOR = '_';

const SOURCES: Readonly<Record<SourceKind, SourceDefinition>> = Object.freeze({
  asn: Object.freeze({
    kind: 'asn',
    table: 'asn_scraped_accidents',
    periodColumn: 'sanitized_date',
    columns: Object.freeze({
      uid: 'uid',
      date: 'date',
      phase: 'phase',
      aircraft_type: 'aircraft_type',
      location: 'location',
      operator: 'operator',
      narrative: 'narrative'
    })
  }),
  asrs: Object.freeze({
    kind: 'asrs',
    table: 'asrs_records',
    periodColumn: 'sanitized_date',
    columns: Object.freeze({
      uid: 'uid',
      date: 'time',
      phase: 'phase',
      aircraft_type: 'aircraft_type',
      location: 'place',
      operator: 'operator',
      narrative: 'synopsis'
    })
  }),
  pci: Object.freeze({
    kind: 'pci',
    table: 'pci_scraped_accidents',
    periodColumn: 'sanitized_date',
    columns: Object.freeze({
      uid: 'uid',
      date: 'date',
      phase: null,
      aircraft_type: 'aircraft_type',
      location: 'location',
      operator: 'operator',
      narrative: 'summary'
    })
  })
});

export function isSourceKind(value: string): value is SourceKind {
  return (SOURCE_KINDS as readonly string[]).includes(value);
}

export function extractPrefix(identifier: string): string | null {
  const index = identifier.indexOf(IDENTIFIER_SEPARATOR);
  if (index < 0) {
    return null;
  }
  return identifier.slice(0, index);
}

export function getSource(kind: SourceKind): SourceDefinition {
  return SOURCES[kind];
}

export function listSources(): SourceDefinition[] {
  return SOURCE_KINDS.map((kind) => SOURCES[kind]);
}

export function resolve(identifier: string): SourceDefinition {
  const prefix = extractPrefix(identifier);
  if (prefix === null) {
    throw new UnknownSourceKindError(identifier, null);
  }
  if (!isSourceKind(prefix)) {
    throw new UnknownSourceKindError(identifier, prefix);
  }
  return SOURCES[prefix];
}

export type SourceBatch = {
  partitions: Map<SourceKind, Set<string>>;
  unknown: string[];
};

/**
 * Groups identifiers by source kind. Identifiers that do not resolve are
 * collected in `unknown` instead of failing the batch.
 */
export function resolveBatch(identifiers: Iterable<string>): SourceBatch {
  const partitions = new Map<SourceKind, Set<string>>();
  const unknown: string[] = [];
  const seenUnknown = new Set<string>();

  for (const identifier of identifiers) {
    const prefix = extractPrefix(identifier);
    if (prefix === null || !isSourceKind(prefix)) {
      if (!seenUnknown.has(identifier)) {
        seenUnknown.add(identifier);
        unknown.push(identifier);
      }
      continue;
    }
    let bucket = partitions.get(prefix);
    if (!bucket) {
      bucket = new Set<string>();
      partitions.set(prefix, bucket);
    }
    bucket.add(identifier);
  }

  return { partitions, unknown };
}
