export interface FocusLog {
  readonly log: (message: string) => void;
  readonly warn: (message: string) => void;
  readonly error: (message: string) => void;
}

export const CONSOLE_FOCUS_LOG: FocusLog = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export const SILENT_FOCUS_LOG: FocusLog = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function scopedLog(log: FocusLog, scope: string): FocusLog {
  const prefix = `[${scope}]`;
  return {
    log: (message) => log.log(`${prefix} ${message}`),
    warn: (message) => log.warn(`${prefix} ${message}`),
    error: (message) => log.error(`${prefix} ${message}`),
  };
}
