/**
 * Debug logging for the encoding engine.
 * Controlled by environment variables:
 * - DEBUG_ENCODINGS=true to enable debug logging
 * - DEBUG_ENCODINGS_LEVEL=TRACE|DEBUG|INFO (default: DEBUG)
 * - DEBUG_ENCODINGS_FILTER=SORT,PAULI,... (comma-separated components)
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
}

export enum LogComponent {
  TERMS = 'TERMS',
  NORMAL_ORDER = 'NORMAL_ORDER',
  SORT = 'SORT',
  PAULI = 'PAULI',
  ENCODING = 'ENCODING',
  TREE = 'TREE',
  HAMILTONIAN = 'HAMILTONIAN',
  CLI = 'CLI',
}

export interface LoggerSettings {
  enabled: boolean;
  level: LogLevel;
  componentFilter: Set<string> | null;
}

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'INFO':
      return LogLevel.INFO;
    default:
      return LogLevel.DEBUG;
  }
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): LoggerSettings {
  const filterStr = env.DEBUG_ENCODINGS_FILTER;
  return {
    enabled: env.DEBUG_ENCODINGS === 'true',
    level: parseLevel(env.DEBUG_ENCODINGS_LEVEL),
    // null means log all components
    componentFilter: filterStr
      ? new Set(filterStr.split(',').map((s) => s.trim()))
      : null,
  };
}

export class DebugLogger {
  private settings: LoggerSettings;

  constructor(
    settings: LoggerSettings = settingsFromEnv(process.env),
    private readonly sink: (line: string) => void = (line) =>
      console.log(line)
  ) {
    this.settings = settings;
  }

  configure(settings: Partial<LoggerSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  shouldLog(level: LogLevel, component: LogComponent): boolean {
    const { enabled, level: min, componentFilter } = this.settings;
    if (!enabled) return false;
    if (level < min) return false;
    if (componentFilter && !componentFilter.has(component)) return false;
    return true;
  }

  private formatMessage(
    level: LogLevel,
    component: LogComponent,
    message: string
  ): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${LogLevel[level]}] [${component}] ${message}`;
  }

  private log(level: LogLevel, component: LogComponent, message: string): void {
    if (this.shouldLog(level, component)) {
      this.sink(this.formatMessage(level, component, message));
    }
  }

  trace(component: LogComponent, message: string): void {
    this.log(LogLevel.TRACE, component, message);
  }

  debug(component: LogComponent, message: string): void {
    this.log(LogLevel.DEBUG, component, message);
  }

  info(component: LogComponent, message: string): void {
    this.log(LogLevel.INFO, component, message);
  }

  /** Logs `prefix: render()`; `render` only runs when the line is emitted. */
  logTerm(
    component: LogComponent,
    level: LogLevel,
    prefix: string,
    render?: () => string
  ): void {
    if (!this.shouldLog(level, component)) return;
    this.log(level, component, render ? `${prefix}: ${render()}` : prefix);
  }
}

// Singleton instance
export const debugLogger = new DebugLogger();

// Convenience exports
export const { trace, debug, info } = {
  trace: debugLogger.trace.bind(debugLogger),
  debug: debugLogger.debug.bind(debugLogger),
  info: debugLogger.info.bind(debugLogger),
};

export const logTerm = debugLogger.logTerm.bind(debugLogger);
