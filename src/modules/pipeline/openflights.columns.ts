import { EntityKind } from '../../types/entity.types';

// Positional layout of the headerless OpenFlights .dat files
export const DAT_COLUMNS: Record<EntityKind, readonly string[]> = {
  airport: [
    'id',
    'name',
    'city',
    'country',
    'iata',
    'icao',
    'latitude',
    'longitude',
    'altitude',
    'timezone',
    'dst',
    'tz',
    'type',
    'source',
  ],
  airline: ['id', 'name', 'alias', 'iata', 'icao', 'callsign', 'country', 'active'],
};

// Columns read from each .dat row; shorter rows are malformed
export const REQUIRED_DAT_WIDTH: Record<EntityKind, number> = {
  airport: 8,
  airline: 8,
};

// Lower-cased CSV header -> canonical field
export const CSV_HEADER_ALIASES: Record<EntityKind, Record<string, string>> = {
  airport: {
    'airport id': 'id',
    airport_id: 'id',
    id: 'id',
    name: 'name',
    city: 'city',
    country: 'country',
    iata: 'iata',
    icao: 'icao',
    latitude: 'latitude',
    lat: 'latitude',
    longitude: 'longitude',
    lon: 'longitude',
    lng: 'longitude',
  },
  airline: {
    'airline id': 'id',
    airline_id: 'id',
    id: 'id',
    name: 'name',
    alias: 'alias',
    iata: 'iata',
    icao: 'icao',
    callsign: 'callsign',
    country: 'country',
    active: 'active',
  },
};

export const INPUT_BASENAMES: Record<EntityKind, string> = {
  airport: 'airports',
  airline: 'airlines',
};
