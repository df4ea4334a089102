export type ChannelKind = 'text' | 'announcement' | 'category' | 'forum' | 'other';

export interface Channel {
  id: string;
  name: string;
  kind: ChannelKind;
  parentId: string | null;
}

export interface Thread {
  id: string;
  name: string;
  parentId: string | null;
  archived: boolean;
}

export interface MessageAuthor {
  id: string;
  name: string;
  isBot: boolean;
}

export interface Embed {
  url?: string;
}

export interface MessageSnapshot {
  content: string;
  embeds: Embed[];
}

export interface Message {
  id: string;
  author: MessageAuthor;
  content: string;
  embeds: Embed[];
  // Present on the starter message of a forum thread
  thread?: { id: string; name: string };
  snapshots: MessageSnapshot[];
}

export interface SourceChannel {
  id: string;
  name: string;
}

export type ProcessingStatus =
  | 'duplicate-run'
  | 'duplicate-historical'
  | 'duplicate-live'
  | 'skipped-platform-excluded'
  | 'scrape-failed'
  | 'summary-empty'
  | 'summary-failed'
  | 'post-failed-thread-create'
  | 'post-failed-chunk'
  | 'post-failed-formatting'
  | 'summarized-posted';

export type DuplicateStatus = Extract<
  ProcessingStatus,
  'duplicate-run' | 'duplicate-historical' | 'duplicate-live'
>;

export interface DeliveryReport {
  ok: boolean;
  sent: number;
  total: number;
  failure?: Extract<
    ProcessingStatus,
    'post-failed-thread-create' | 'post-failed-chunk' | 'post-failed-formatting'
  >;
  failedIndex?: number;
}

export interface RunReport {
  total: number;
  posted: number;
  skipped: number;
  failed: number;
  durationMs: number;
  statuses: Record<string, ProcessingStatus>;
}
