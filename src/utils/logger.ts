/**
 * Logger Utility
 *
 * Adds timestamps to all console logs for easier tracing of tick ordering.
 * Format: [HH:MM:SS.mmm] [Component] message
 *
 * Modules log through `console` directly with a bracketed component tag
 * (e.g. "[Admission Scheduler]"); this wrapper only decorates the output.
 */

type ConsoleMethodName = 'log' | 'error' | 'warn' | 'info' | 'debug';
type ConsoleMethod = (...args: unknown[]) => void;

const COMPONENT_TAG = /^\[[^\]]+\]/;

let installed = false;

/**
 * Format timestamp as [HH:MM:SS.mmm]
 */
export function formatTimestamp(date: Date = new Date()): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const milliseconds = String(date.getMilliseconds()).padStart(3, '0');
  return `[${hours}:${minutes}:${seconds}.${milliseconds}]`;
}

/**
 * Prefix a console argument list with a timestamp.
 *
 * If the first argument already starts with a component tag, the timestamp is
 * inserted in front of it in the same string; otherwise it becomes a separate
 * first argument so objects and numbers are passed through untouched.
 */
export function withTimestamp(args: unknown[], timestamp: string = formatTimestamp()): unknown[] {
  const [first, ...rest] = args;
  if (typeof first === 'string' && COMPONENT_TAG.test(first)) {
    return [`${timestamp} ${first}`, ...rest];
  }
  return [timestamp, ...args];
}

function wrapConsoleMethod(originalMethod: ConsoleMethod): ConsoleMethod {
  return (...args: unknown[]) => {
    originalMethod(...withTimestamp(args));
  };
}

/**
 * Initialize logger by wrapping console methods.
 *
 * Call once at process startup. Repeated calls are ignored.
 */
export function initializeLogger(): void {
  if (installed) {
    return;
  }
  installed = true;

  const originalLog = console.log.bind(console);
  const methods: ConsoleMethodName[] = ['log', 'error', 'warn', 'info', 'debug'];

  for (const name of methods) {
    const original: ConsoleMethod = console[name].bind(console);
    console[name] = wrapConsoleMethod(original);
  }

  originalLog(`${formatTimestamp()} [Logger] Timestamped logging enabled`);
}
