import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { getDatabaseConfig } from '../connection-helper';
import { buildUpsertStatement } from '../../src/modules/catalog/catalog.sql';
import { StoredEntity } from '../../src/types/entity.types';

config();

const dimensions = parseInt(process.env.EMBEDDING_DIM || '512', 10);

const AppDataSource = new DataSource({
  type: 'mariadb',
  ...getDatabaseConfig(),
  synchronize: false,
  logging: true,
});

// Zero vectors: enough to exercise filters and the API before a real seed
function zeroVector(): number[] {
  return new Array<number>(dimensions).fill(0);
}

const airports: StoredEntity<'airport'>[] = [
  {
    id: 1,
    name: 'Test Airport',
    city: 'Test City',
    country: 'Testland',
    iata: 'TST',
    icao: 'TST1',
    latitude: 10,
    longitude: 20,
    url: 'https://example.com/test-airport.jpg',
    metadata: { style: 'glass', tags: ['green', 'modern'], license: 'CC-BY' },
    embedding: zeroVector(),
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
    url: null,
    metadata: { style: 'steel', tags: ['industrial'], license: 'CC0' },
    embedding: zeroVector(),
  },
];

const airlines: StoredEntity<'airline'>[] = [
  {
    id: 100,
    name: 'SkyVision Airways',
    alias: null,
    iata: 'SV',
    icao: 'SVN',
    callsign: 'SKYVISION',
    country: 'Testland',
    active: 'Y',
    url: 'https://example.com/logo-sv.png',
    metadata: { brand_colors: ['#0F62FE', '#161616'], license: 'CC-BY' },
    embedding: zeroVector(),
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
    url: null,
    metadata: { brand_colors: ['#FF3B30', '#1C1C1E'], license: 'CC0' },
    embedding: zeroVector(),
  },
];

async function seedMinimal() {
  await AppDataSource.initialize();
  console.log('Database connection established');

  try {
    await AppDataSource.transaction(async (manager) => {
      const airportUpsert = buildUpsertStatement('airport', airports);
      await manager.query(airportUpsert.sql, airportUpsert.params);

      const airlineUpsert = buildUpsertStatement('airline', airlines);
      await manager.query(airlineUpsert.sql, airlineUpsert.params);
    });
    console.log(`Seeded ${airports.length} airports and ${airlines.length} airlines`);
  } finally {
    await AppDataSource.destroy();
  }
}

seedMinimal().catch((error: unknown) => {
  console.error('Error seeding minimal data:', error);
  process.exit(1);
});
