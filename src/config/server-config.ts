import { z } from 'zod';

import { ValidatedField } from '../utils/validated-field';
import { readEnvSettings } from './env';

export const HostSchema = z.string();
export const PortSchema = z.number().int();

/**
 * Plain snapshot of a ServerConfig
 */
export interface ServerConfigData {
  host: string;
  port: number;
}

/**
 * Host/port configuration shared by every service the manager builds.
 * Both fields are checked on construction and on every later mutation.
 */
export class ServerConfig {
  private readonly hostField: ValidatedField<string>;
  private readonly portField: ValidatedField<number>;

  constructor(host: unknown, port: unknown) {
    this.hostField = new ValidatedField('host', HostSchema, 'string', host);
    this.portField = new ValidatedField('port', PortSchema, 'integer', port);
  }

  /**
   * Build a configuration from SERVICE_HOST / SERVICE_PORT, falling back to
   * localhost:8000. A non-numeric SERVICE_PORT fails the port check.
   */
  static fromEnv(source: NodeJS.ProcessEnv = process.env): ServerConfig {
    const settings = readEnvSettings(source);
    return new ServerConfig(settings.host, parsePort(settings.port));
  }

  get host(): string {
    return this.hostField.get();
  }

  get port(): number {
    return this.portField.get();
  }

  setHost(value: unknown): void {
    this.hostField.set(value);
  }

  setPort(value: unknown): void {
    this.portField.set(value);
  }

  toJSON(): ServerConfigData {
    return { host: this.host, port: this.port };
  }

  toString(): string {
    return `ServerConfig(host='${this.host}', port=${this.port})`;
  }
}

/**
 * Turn textual port input (env var, CLI flag) into an integer when it is one;
 * anything else is passed through unchanged so the port field rejects it.
 */
export function parsePort(value: string | number): unknown {
  if (typeof value === 'number') {
    return value;
  }
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : value;
}
