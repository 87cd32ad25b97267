export type FetchErrorReason = 'network' | 'timeout' | 'bad_status' | 'parse';

/** Failure to retrieve or understand an upstream observation. */
export class FetchError extends Error {
  override readonly name = 'FetchError';

  constructor(
    readonly reason: FetchErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Failure to serialize metrics into the exposition format. */
export class EncodingError extends Error {
  override readonly name = 'EncodingError';
}
