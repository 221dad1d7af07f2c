import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 8000;

/**
 * Raw settings read from the environment
 */
export interface EnvSettings {
  host: string;
  port: string | number;
}

/**
 * Read SERVICE_HOST and SERVICE_PORT, applying defaults for unset values
 */
export function readEnvSettings(source: NodeJS.ProcessEnv = process.env): EnvSettings {
  return {
    host: source.SERVICE_HOST || DEFAULT_HOST,
    port: source.SERVICE_PORT || DEFAULT_PORT,
  };
}
