import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { join } from 'path';
import { getDatabaseConfig } from './connection-helper';

config();

const dbConfig = getDatabaseConfig();

// Used by the migration CLI against the compiled output
export default new DataSource({
  type: 'mariadb',
  ...dbConfig,
  entities: [join(__dirname, '../src/entities/**/*.entity.js')],
  migrations: [join(__dirname, 'migrations/**/*.js')],
  synchronize: false,
  logging: true,
});
