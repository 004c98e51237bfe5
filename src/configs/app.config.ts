import { registerAs } from '@nestjs/config';
import { parseBoolean, parseCorsOrigins, parseInteger } from '../common/utils/env.util';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  corsOrigins: string[] | '*';
  mediaDir: string;
  publicBaseUrl: string | null;
  logSql: boolean;
}

export default registerAs(
  'app',
  (): AppConfig => ({
    port: parseInteger(process.env.PORT, 3000, 'PORT'),
    nodeEnv: process.env.NODE_ENV || 'development',
    // '*' or a comma-separated list of origins
    corsOrigins: parseCorsOrigins(process.env.CORS_ALLOW_ORIGINS),
    mediaDir: process.env.MEDIA_DIR || 'data/media',
    publicBaseUrl: process.env.PUBLIC_BASE_URL || null,
    logSql: parseBoolean(process.env.DB_LOG_SQL, false),
  }),
);
