export type ChannelKind = 'video' | 'radio';

export interface Channel {
  id: string;
  // logical channel number, display order only; null when the playlist gives none
  lcn: number | null;
  name: string;
  logo?: string;
  stream: string;
  kind: ChannelKind;
  // XMLTV channel id named by the playlist (tvg-id)
  guideId?: string;
  group?: string;
}

// A playlist entry as read, before validation
export interface ChannelDraft {
  id?: string;
  lcn?: string | number | null;
  name: string;
  logo?: string;
  stream: string;
  kind: ChannelKind;
  guideId?: string;
  group?: string;
}

export interface PlaylistFetchResult {
  channels: Channel[];
  fetchedAt: number;
  dropped: number;
}
