/**
 * Debug diagnostics for the tree modules
 *
 * The library only reports build and recompute timings, so there is a single
 * level. Silent unless LOG_LEVEL=debug. Lines go to stderr, leaving stdout to
 * whatever program embeds the trees: one JSON object per line when
 * NODE_ENV=production, a readable line otherwise.
 *
 * @module logger
 */

export type LogMetadata = Readonly<Record<string, unknown>>;

export interface DebugLoggerConfig {
  /** Reported as `hashcommit:<module>` */
  readonly module: string;
  readonly enabled: boolean;
  readonly json: boolean;
  readonly write?: (line: string) => void;
}

export class DebugLogger {
  readonly service: string;
  readonly enabled: boolean;
  private readonly json: boolean;
  private readonly write: (line: string) => void;

  constructor(config: DebugLoggerConfig) {
    this.service = `hashcommit:${config.module}`;
    this.enabled = config.enabled;
    this.json = config.json;
    this.write = config.write ?? ((line) => console.error(line));
  }

  format(message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.json) {
      return JSON.stringify({
        timestamp,
        level: 'debug',
        service: this.service,
        message,
        ...metadata,
      });
    }

    const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
    return `[${timestamp}] DEBUG ${this.service}: ${message}${metaStr}`;
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.enabled) return;
    this.write(this.format(message, metadata));
  }
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.LOG_LEVEL?.toLowerCase() === 'debug';
}

export function createLogger(module: string, env: NodeJS.ProcessEnv = process.env): DebugLogger {
  return new DebugLogger({
    module,
    enabled: isDebugEnabled(env),
    json: env.NODE_ENV === 'production',
  });
}
