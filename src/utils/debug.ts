export const truncate = (s: string, max = 2048) => (s.length > max ? `${s.slice(0, max)}…` : s);

/**
 * Plain-object view of an error for debug event details.
 */
export const errorToDebug = (error: unknown) => {
  if (error instanceof Error) {
    return { name: error.name, message: truncate(error.message), cause: error.cause };
  }
  return { message: truncate(String(error)) };
};
