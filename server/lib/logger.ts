// =============================================================================
// Structured console logger
// Same (obj, msg) call shape everywhere; writes to stderr because stdout is
// reserved for the inventory JSON handed to the automation framework.
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface InventoryLogger {
  debug: (obj: Record<string, unknown>, msg: string) => void;
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value ?? '').toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'error':
      return 'error';
    default:
      return 'warn';
  }
}

export function formatFields(obj: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined && value !== null) {
      parts.push(`${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
    }
  }
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

export function createConsoleLogger(
  scope: string,
  level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
): InventoryLogger {
  const threshold = LEVEL_ORDER[level];
  const emit = (lvl: LogLevel, obj: Record<string, unknown>, msg: string): void => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    console.error(`[${scope}] [${lvl.toUpperCase()}] ${msg}${formatFields(obj)}`);
  };

  return {
    debug: (obj, msg) => emit('debug', obj, msg),
    info: (obj, msg) => emit('info', obj, msg),
    warn: (obj, msg) => emit('warn', obj, msg),
    error: (obj, msg) => emit('error', obj, msg),
  };
}

export const silentLogger: InventoryLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
