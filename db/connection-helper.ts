export interface MariaDbConnectionConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  poolSize: number;
  connectTimeout: number;
}

export function parseDatabaseUrl(
  databaseUrl?: string,
): Pick<MariaDbConnectionConfig, 'host' | 'port' | 'username' | 'password' | 'database'> | null {
  if (!databaseUrl) {
    return null;
  }

  try {
    // Replace mariadb:// or mysql:// with http:// for URL parsing
    const url = new URL(databaseUrl.replace(/^(mariadb|mysql):/, 'http:'));

    return {
      host: url.hostname,
      port: parseInt(url.port || '3306', 10),
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password),
      database: url.pathname.slice(1), // Remove leading '/'
    };
  } catch (error) {
    console.error('Error parsing DATABASE_URL:', error);
    return null;
  }
}

export function getDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env,
): MariaDbConnectionConfig {
  const pool = {
    poolSize: parseInt(env.DB_POOL_SIZE || '5', 10),
    connectTimeout: parseInt(env.DB_CONNECT_TIMEOUT || '5000', 10),
  };

  const parsed = parseDatabaseUrl(env.DATABASE_URL);
  if (parsed) {
    return { ...parsed, ...pool };
  }

  // Fallback to individual variables
  return {
    host: env.DB_HOST || 'localhost',
    port: parseInt(env.DB_PORT || '3306', 10),
    username: env.DB_USER || 'sky',
    password: env.DB_PASSWORD || 'vision',
    database: env.DB_NAME || 'skyvision',
    ...pool,
  };
}
