import { toAirportDetails } from '../db/rowMappers';
import type { AirportDetails, AirportRow, QueryClient } from '../db/types';

export const MAX_AIRPORT_CODES = 500;

export function normalizeAirportCodes(codes: Iterable<string>): string[] {
  const normalized = new Set<string>();
  for (const code of codes) {
    const trimmed = code.trim().toLowerCase();
    if (trimmed.length > 0) {
      normalized.add(trimmed);
    }
  }
  return Array.from(normalized);
}

/**
 * Resolves ICAO or IATA codes against the airport reference table. Keys of the
 * returned map are the lower-cased requested codes; codes without a match are
 * left out. An ICAO match wins over an IATA match for the same code.
 */
export async function lookupAirports(
  client: QueryClient,
  codes: Iterable<string>
): Promise<Map<string, AirportDetails>> {
  const requested = normalizeAirportCodes(codes);
  const found = new Map<string, AirportDetails>();
  if (requested.length === 0) {
    return found;
  }

  const result = await client.query<AirportRow>(
    `SELECT icao_code, iata_code, name, city, country, lat, lon
       FROM airport_location
      WHERE lower(icao_code) = ANY($1::text[])
         OR lower(iata_code) = ANY($1::text[])`,
    [requested]
  );

  const byIcao = new Map<string, AirportRow>();
  const byIata = new Map<string, AirportRow>();
  for (const row of result.rows) {
    if (row.icao_code) {
      byIcao.set(row.icao_code.toLowerCase(), row);
    }
    if (row.iata_code && !byIata.has(row.iata_code.toLowerCase())) {
      byIata.set(row.iata_code.toLowerCase(), row);
    }
  }

  for (const code of requested) {
    const row = byIcao.get(code) ?? byIata.get(code);
    if (row) {
      found.set(code, toAirportDetails(row));
    }
  }
  return found;
}
