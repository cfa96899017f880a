export const FOCUS_ERROR_CODES = {
  E_INVALID_DURATION: "E_INVALID_DURATION",
  E_INVALID_LIMIT: "E_INVALID_LIMIT",
  E_INVALID_STATE: "E_INVALID_STATE",
  E_STORAGE: "E_STORAGE",
  E_NOTIFICATION: "E_NOTIFICATION",
  E_CONFIGURATION: "E_CONFIGURATION",
} as const;

export type FocusErrorCode = (typeof FOCUS_ERROR_CODES)[keyof typeof FOCUS_ERROR_CODES];
