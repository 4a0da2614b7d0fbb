/**
 * Debug channels
 *
 * Targeted logging of what the engine does: graph assembly, schedule
 * compilation and processing calls.
 *
 * Enable via environment variable:
 * ```bash
 * DAGFLOW_DEBUG=compile npm test         # Just compilation
 * DAGFLOW_DEBUG=graph,process npm test   # Multiple channels
 * DAGFLOW_DEBUG=* npm test               # Everything
 * ```
 *
 * In code, channels are always called and cost a no-op call when disabled:
 * ```typescript
 * debug.compile('miss', { key, inputs: ids.size });
 * ```
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export type ChannelName = 'graph' | 'compile' | 'process';

export interface DebugConfig {
  format: 'json' | 'pretty';
  timestamps: boolean;
  /** Sink for formatted lines (defaults to console.log) */
  output: (message: string) => void;
}

const CHANNELS: readonly ChannelName[] = ['graph', 'compile', 'process'];

const DEFAULT_CONFIG: DebugConfig = {
  format: 'pretty',
  timestamps: false,
  output: (message) => console.log(message)
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(raw: string | undefined): Set<string> {
  const env = (raw ?? '').trim();
  if (!env || env === '0' || env === 'false') return new Set();
  if (env === '*' || env === '1' || env === 'true') return new Set(['*']);
  return new Set(env.split(',').map((s) => s.trim().toLowerCase()));
}

let enabled = parseDebugEnv(process.env['DAGFLOW_DEBUG']);

function isEnabled(channel: ChannelName): boolean {
  return enabled.has('*') || enabled.has(channel);
}

function formatMessage(channel: ChannelName, point: string, data: DebugData | undefined): string {
  if (config.format === 'json') {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() })
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : '';
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return `${prefix}${label}`;

  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(', ')} }`;
}

function formatValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return value.length > 60 ? `"${value.slice(0, 57)}..."` : `"${value}"`;
  if (Array.isArray(value) && value.length > 8) return `[${value.length} items]`;
  try {
    return JSON.stringify(value);
  } catch {
    return '[unserializable]';
  }
}

function createChannel(name: ChannelName): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point, data) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Channel functions. Rebuilt by refreshDebugChannels(), so always read
 * through this object rather than caching a channel.
 */
export const debug: Record<ChannelName, DebugChannel> = {
  graph: createChannel('graph'),
  compile: createChannel('compile'),
  process: createChannel('process')
};

/**
 * Re-read the enabled channel list. Pass a value to override DAGFLOW_DEBUG.
 */
export function refreshDebugChannels(channels: string | undefined = process.env['DAGFLOW_DEBUG']): void {
  enabled = parseDebugEnv(channels);
  for (const name of CHANNELS) {
    debug[name] = createChannel(name);
  }
}

export function configureDebug(overrides: Partial<DebugConfig>): void {
  config = { ...config, ...overrides };
}

export function resetDebugConfig(): void {
  config = { ...DEFAULT_CONFIG };
}
