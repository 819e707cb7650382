interface WelcomeBotErrorOptions {
  cause?: unknown;
  status?: number;
}

/**
 * Base class for failures the bot knows how to report. `status` carries the
 * HTTP status of the API response that caused it, when there was one.
 */
export class WelcomeBotError extends Error {
  readonly status?: number;

  constructor(message: string, options: WelcomeBotErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.status = options.status;
  }
}

/**
 * Missing or invalid configuration. Printed without a stack trace; it is not
 * a code bug.
 */
export class ConfigurationError extends WelcomeBotError {}

/** Token request failed. Fatal: nothing else can be called without a token. */
export class AuthenticationError extends WelcomeBotError {}

/** Hashtag timeline could not be read. Aborts the current pass only. */
export class FetchError extends WelcomeBotError {}

/** A single reply could not be posted. The rest of the batch continues. */
export class PostError extends WelcomeBotError {}
