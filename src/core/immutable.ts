export const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

/** Detached, frozen copy: callers can hold it without seeing later writes. */
export const snapshot = <T>(value: T): T => deepFreeze(structuredClone(value));
