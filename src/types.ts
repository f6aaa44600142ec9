export interface WorkItem {
  url: string;
  filename: string; // last path segment of the URL, identity of the item
}

export type DownloadOutcome =
  | "completed"
  | "http_status" // non-2xx, not retried
  | "retries_exhausted"
  | "unexpected";

export interface DownloadResult {
  url: string;
  filename: string;
  ok: boolean;
  outcome: DownloadOutcome;
  attempts: number;
  bytes?: number;
  status?: number;
  error?: string;
}

export interface BatchSummary {
  requested: number; // work list entries that were URLs
  skipped: number; // already in the ledger
  attempted: number;
  succeeded: number;
  failed: number;
  connectivityOk?: boolean;
  results: DownloadResult[];
}

export interface TranscriptSegment {
  idx: number;
  startMs: number;
  endMs: number;
  speaker?: string;
  text: string;
}

export interface Transcript {
  file: string;
  language?: string;
  durationMs?: number;
  model?: string;
  text: string;
  segments: TranscriptSegment[];
}

export interface TranscriptionRunSummary {
  successful: number;
  failed: number;
  skipped: number;
}
