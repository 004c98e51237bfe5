import { registerAs } from '@nestjs/config';
import { getDatabaseConfig, MariaDbConnectionConfig } from '../../db/connection-helper';

export type DatabaseConfig = MariaDbConnectionConfig;

export default registerAs('database', (): DatabaseConfig => getDatabaseConfig());
