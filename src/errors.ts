export type ErrorKind =
  | 'malformed-guide'
  | 'guide-unavailable'
  | 'playlist-unavailable'
  | 'unknown-channel'
  | 'config';

export abstract class TvGridError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The XMLTV document could not be parsed at all. The previous guide stays published. */
export class MalformedGuideError extends TvGridError {
  readonly kind = 'malformed-guide';
}

/** No guide URL answered with a document. */
export class GuideUnavailableError extends TvGridError {
  readonly kind = 'guide-unavailable';
}

/** Transport, status or format failure while fetching the playlist. */
export class PlaylistUnavailableError extends TvGridError {
  readonly kind = 'playlist-unavailable';
}

export class UnknownChannelError extends TvGridError {
  readonly kind = 'unknown-channel';

  constructor(readonly channelId: string) {
    super(`Unknown channel: ${channelId}`);
  }
}

export class ConfigError extends TvGridError {
  readonly kind = 'config';
}
