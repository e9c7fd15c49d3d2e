/**
 * Host runtime contracts shared by stores and services.
 */

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
}

export const defaultLogger: Logger = {
  info: (obj, msg) => console.log(`[INFO] ${msg || ''}`, obj),
  warn: (obj, msg) => console.warn(`[WARN] ${msg || ''}`, obj),
  error: (obj, msg) => console.error(`[ERROR] ${msg || ''}`, obj),
};

export const defaultClock: Clock = {
  now: () => Date.now(),
};
