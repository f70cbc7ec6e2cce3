export const ensureError = (value: unknown, fallbackMessage = 'Unknown error'): Error => {
  if (value instanceof Error) {
    return value;
  }

  if (value && typeof value === 'object' && 'message' in value) {
    return new Error(typeof value.message === 'string' ? value.message : fallbackMessage);
  }

  return new Error(typeof value === 'string' ? value : fallbackMessage);
};
