/**
 * Types for artifact transfers.
 * @module fetch/types
 */

export type DownloadStatus = 'pending' | 'in-progress' | 'completed' | 'failed';

/**
 * Progress sample delivered to `onProgress`. `percent` is null when the
 * server did not announce a length.
 */
export interface ProgressSample {
  readonly bytesReceived: number;
  readonly bytesTotal: number | null;
  readonly percent: number | null;
}

export interface FetchOutcome {
  readonly destinationPath: string;
  /** Size of the destination file after the call */
  readonly bytes: number;
  /** True when an existing download was reused */
  readonly skipped: boolean;
}

export interface FetchOptions {
  /** Interval at which progress is sampled. Default: 250 */
  readonly pollIntervalMs?: number;
  readonly onProgress?: (sample: ProgressSample) => void;
}

/**
 * Open response of a transport. The body is consumed exactly once.
 */
export interface TransportResponse {
  readonly status: number;
  readonly statusText: string;
  readonly contentLength: number | null;
  readonly body: AsyncIterable<Uint8Array>;
  /** Releases a body that will not be read */
  cancel?(): Promise<void>;
}

/**
 * Network boundary of the fetcher. Rejections are transport failures.
 */
export interface Transport {
  open(url: string): Promise<TransportResponse>;
}
