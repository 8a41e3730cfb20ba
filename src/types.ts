export type DownloadMode = 'audio' | 'video';

export type Outcome =
  | { readonly status: 'success'; readonly filePath: string; readonly directory?: string }
  | { readonly status: 'failed'; readonly reason: string }
  | { readonly status: 'cancelled' };

export type OutcomeStatus = Outcome['status'];

export interface ItemRef {
  readonly id: number;
  readonly url: string;
  readonly label?: string;
}

export interface Completion {
  readonly index: number;
  readonly url: string;
  readonly outcome: Outcome;
}

export interface FailedItem {
  readonly url: string;
  readonly reason: string;
}

export interface BatchResult {
  readonly total: number;
  readonly success: number;
  readonly failed: number;
  readonly cancelled: number;
  readonly skipped: number;
  readonly failures: readonly FailedItem[];
  readonly completions: readonly Completion[];
  readonly interrupted: boolean;
}

export type LogLevel = 'info' | 'warn' | 'error';

export type ProgressEvent =
  | { readonly type: 'log'; readonly level: LogLevel; readonly message: string }
  | { readonly type: 'progress'; readonly fraction: number; readonly item?: ItemRef }
  | { readonly type: 'status'; readonly text: string }
  | {
      readonly type: 'item';
      readonly phase: 'started' | 'finished';
      readonly item: ItemRef;
      readonly outcome?: Outcome;
    }
  | { readonly type: 'done'; readonly status: string; readonly progress: 0 };

/**
 * Metadata resolved for a single URL before anything is downloaded.
 */
export interface MediaInfo {
  readonly id: string;
  readonly title: string;
  readonly uploader: string;
  readonly webpageUrl: string;
  readonly description: string;
  readonly uploadDate?: string;
  readonly durationSeconds?: number;
  readonly viewCount?: number;
  readonly likeCount?: number;
}

export interface FetchRequest {
  readonly url: string;
  readonly info: MediaInfo;
  readonly mode: DownloadMode;
  /** Absolute path of the mp3 in audio mode, of the per-video directory in video mode. */
  readonly target: string;
  readonly audioBitrate: number;
  readonly formatSelector: string;
}

export interface TransferProgress {
  readonly fraction: number;
  readonly status: string;
}

export type ProgressDirective = 'continue' | 'abort';

export type ProgressCallback = (progress: TransferProgress) => ProgressDirective;

export type FetchResult =
  | { readonly status: 'completed'; readonly filePath: string }
  | { readonly status: 'aborted' };

/**
 * External collaborator that talks to the hosting platform.
 */
export interface MediaFetcher {
  resolve(url: string): Promise<MediaInfo>;
  fetch(request: FetchRequest, onProgress: ProgressCallback): Promise<FetchResult>;
}
