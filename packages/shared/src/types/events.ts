export type MediaType = 'audio' | 'video';

export interface StreamInfoEvent {
  type: 'stream-info';
  videoTitle: string;
  scheduledStart: Date | null;
}

export interface FragmentEvent {
  type: 'fragment';
  manifestId: string;
  mediaType: MediaType;
  currentFragment: number;
  maxFragments: number;
  fragmentSize: number;
}

export interface SelectedFormat {
  itag: number;
  qualityLabel: string | null;
  bitrate: number | null;
  codec: string | null;
  targetDurationSec: number;
}

export interface FormatSelectionEvent {
  type: 'format-selection';
  manifestId: string;
  majorType: MediaType;
  format: SelectedFormat;
}

export interface StreamMuxEvent {
  type: 'stream-mux';
}

export interface StreamMuxProgressEvent {
  type: 'stream-mux-progress';
  manifestId: string;
  progress: {
    outTime: number;
    totalSize: number | null;
  };
}

export interface StreamUnavailableEvent {
  type: 'stream-unavailable';
}

export interface JobFinishedEvent {
  type: 'job-finished';
  outputPaths: string[];
}

export interface FailedOutputMoveEvent {
  type: 'failed-output-move';
}

export interface TextEvent {
  type: 'text';
  text: string;
}

/**
 * Messages emitted by a download engine while it archives a stream.
 */
export type ArchiveEvent =
  | StreamInfoEvent
  | FragmentEvent
  | FormatSelectionEvent
  | StreamMuxEvent
  | StreamMuxProgressEvent
  | StreamUnavailableEvent
  | JobFinishedEvent
  | FailedOutputMoveEvent
  | TextEvent;

export type ArchiveEventType = ArchiveEvent['type'];

export interface EventSink {
  handleEvent(event: ArchiveEvent): Promise<void>;
}
