/**
 * Abstracted clock for testability.
 */
export const clock = {
  isoNow(): string {
    return new Date().toISOString();
  },
};
