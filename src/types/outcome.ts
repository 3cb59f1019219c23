/**
 * Outcome types returned across the source, storage and retry boundaries.
 * Expected conditions (not found, transient errors) travel as data here,
 * never as exceptions.
 */

import type { ComicRecord } from "./comic";

export type FailureKind = "network" | "server" | "malformed" | "persistence";

export interface FailureCause {
  kind: FailureKind;
  message: string;
  retryable: boolean;
  status?: number; // HTTP status, for server failures
  code?: string; // System error code, e.g. "ECONNRESET" or "ENOSPC"
}

export interface SuccessOutcome {
  type: "success";
  record: ComicRecord;
}

export interface NotFoundOutcome {
  type: "not-found";
  identifier: number;
}

export interface TransientFailureOutcome {
  type: "transient-failure";
  identifier: number;
  cause: FailureCause;
}

export interface PermanentSkipOutcome {
  type: "permanent-skip";
  identifier: number;
  reason: string;
}

export type FetchOutcome =
  | SuccessOutcome
  | NotFoundOutcome
  | TransientFailureOutcome
  | PermanentSkipOutcome;

export type ImageOutcome =
  | { type: "image"; bytes: Uint8Array }
  | TransientFailureOutcome
  | PermanentSkipOutcome;

export type LatestOutcome =
  | { type: "latest"; identifier: number }
  | { type: "unavailable"; cause: FailureCause };

export type SaveOutcome =
  | { type: "saved"; imagePath: string; metadataPath: string }
  | { type: "failed"; cause: FailureCause };
