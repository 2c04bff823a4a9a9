export interface Programme {
  channelId: string; // XMLTV channel id
  start: number; // UTC epoch ms
  end: number; // UTC epoch ms, always > start
  title: string;
  description?: string;
  category?: string;
}

export interface GuideChannel {
  id: string;
  // every <display-name>, in document order
  names: string[];
  lcn?: number;
  icon?: string;
}

export interface ParseStats {
  programmes: number;
  // entries missing channel/start/stop/title or with unreadable times
  skippedIncomplete: number;
  // end <= start
  droppedInverted: number;
  droppedOverlapping: number;
}

export interface ParsedGuide {
  programmes: Map<string, Programme[]>;
  channels: GuideChannel[];
  stats: ParseStats;
}

export interface ParseGuideOptions {
  // IANA zone for timestamps without a UTC offset (default: UTC)
  fallbackTimeZone?: string;
}

export type NowNextResult =
  | { status: 'ok'; current?: Programme; next?: Programme; progress?: number }
  | { status: 'unknown-channel'; channelId: string };
