import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateAirportAndAirlineTables1767000000000
  implements MigrationInterface
{
  public async up(queryRunner: QueryRunner): Promise<void> {
    // VECTOR(512) must match EMBEDDING_DIM; the loader refuses to write otherwise
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS airports (
        id           INT PRIMARY KEY,
        name         VARCHAR(255) NOT NULL,
        city         VARCHAR(255) COLLATE utf8mb4_nopad_bin,
        country      VARCHAR(255) COLLATE utf8mb4_nopad_bin,
        iata         VARCHAR(8),
        icao         VARCHAR(8),
        latitude     DOUBLE,
        longitude    DOUBLE,
        image_url    TEXT,
        metadata     JSON,
        embedding    VECTOR(512) NOT NULL,
        created_at   TIMESTAMP NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at   TIMESTAMP NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP
      ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS airlines (
        id           INT PRIMARY KEY,
        name         VARCHAR(255) NOT NULL,
        alias        VARCHAR(255),
        iata         VARCHAR(8),
        icao         VARCHAR(8),
        callsign     VARCHAR(255),
        country      VARCHAR(255) COLLATE utf8mb4_nopad_bin,
        active       CHAR(1),
        logo_url     TEXT,
        metadata     JSON,
        embedding    VECTOR(512) NOT NULL,
        created_at   TIMESTAMP NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at   TIMESTAMP NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP
      ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
    `);

    // BTREE indexes for the search filters
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_airports_country ON airports (country);`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_airports_city ON airports (city);`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_airlines_country ON airlines (country);`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_airlines_name ON airlines (name);`);

    // HNSW vector indexes, one per table. Cosine matches VEC_DISTANCE_COSINE in the queries.
    await queryRunner.query(`
      ALTER TABLE airports
      ADD VECTOR INDEX IF NOT EXISTS vidx_airports_embedding (embedding) DISTANCE=cosine;
    `);
    await queryRunner.query(`
      ALTER TABLE airlines
      ADD VECTOR INDEX IF NOT EXISTS vidx_airlines_embedding (embedding) DISTANCE=cosine;
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS airlines;`);
    await queryRunner.query(`DROP TABLE IF EXISTS airports;`);
  }
}
