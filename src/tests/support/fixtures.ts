import { AirlineRecord, AirportRecord } from '../../types/entity.types';
import { InMemoryEntityStore } from './in-memory-entity.store';

export const TEST_AIRPORTS: AirportRecord[] = [
  {
    id: 1,
    name: 'Test Airport',
    city: 'Test City',
    country: 'Testland',
    iata: 'TST',
    icao: 'TST1',
    latitude: 10,
    longitude: 20,
  },
  {
    id: 2,
    name: 'Demo Field',
    city: 'Demo City',
    country: 'Demostan',
    iata: 'DMO',
    icao: 'DMO1',
    latitude: 30,
    longitude: 40,
  },
];

export const TEST_AIRLINES: AirlineRecord[] = [
  {
    id: 100,
    name: 'SkyVision Airways',
    alias: null,
    iata: 'SV',
    icao: 'SVN',
    callsign: 'SKYVISION',
    country: 'Testland',
    active: 'Y',
  },
  {
    id: 101,
    name: 'Demo Airlines',
    alias: null,
    iata: 'DM',
    icao: 'DMO',
    callsign: 'DEMOAIR',
    country: 'Demostan',
    active: 'Y',
  },
];

export function unitVector(axis: number, dimensions = 8): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  vector[axis] = 1;
  return vector;
}

/**
 * Airports 1-3 and airlines 100-101. Airport 1 sits on the "glass" axis of the
 * fake model, airport 3 on the "garden" axis and airline 100 on the "logo" axis.
 */
export function seedCatalog(store: InMemoryEntityStore): void {
  store.seed('airport', [
    {
      ...TEST_AIRPORTS[0],
      url: 'https://img.test/a1.jpg',
      metadata: { style: 'glass', tags: ['green', 'modern'] },
      embedding: unitVector(0),
    },
    {
      ...TEST_AIRPORTS[1],
      url: null,
      metadata: { style: 'steel', tags: ['industrial'] },
      embedding: unitVector(2),
    },
    {
      id: 3,
      name: 'Garden Gate',
      city: 'Green City',
      country: 'Testland',
      iata: 'GGT',
      icao: 'GGT1',
      latitude: -5,
      longitude: 10,
      url: null,
      metadata: { style: 'garden', tags: ['greenery'] },
      embedding: unitVector(1),
    },
  ]);
  store.seed('airline', [
    {
      ...TEST_AIRLINES[0],
      url: 'https://img.test/logo-sv.png',
      metadata: { license: 'CC-BY' },
      embedding: unitVector(3),
    },
    { ...TEST_AIRLINES[1], url: null, metadata: null, embedding: unitVector(5) },
  ]);
}
