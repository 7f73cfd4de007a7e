/** Capacity of a "long" output buffer, terminating NUL included. */
export const BUFFER_LEN = 8192;

/** Capacity of a "short" output buffer, terminating NUL included. */
export const SBUF_LEN = 32;
