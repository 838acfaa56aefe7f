import { FetchMode } from './device.types';
import { FetchFailure } from '@/utils/errors';

export type DocumentKind = 'html' | 'json';

export interface FetchedDocument {
  endpoint: string;
  kind: DocumentKind;
  body: string;
  fetched_at: Date;
}

export interface FetchRequest {
  endpoint: string;
  timeout_ms: number;
  ready_selector?: string;     // browser mode: wait for this node before snapshotting
  signal?: AbortSignal;
}

export type FetchOutcome =
  | { success: true; document: FetchedDocument }
  | { success: false; error: FetchFailure };

export interface DocumentFetcher {
  readonly mode: FetchMode;
  fetch(request: FetchRequest): Promise<FetchOutcome>;
}

export interface RetryPolicy {
  max_attempts: number;
  delay_ms: number;
}

export type RetryOutcome = FetchOutcome & { attempts: number };
