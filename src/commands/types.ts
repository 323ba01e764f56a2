/**
 * Type definitions for command results.
 *
 * Each command's formatter receives exactly its result type.
 */

/**
 * Upcheck command result
 */
export interface UpcheckResult {
  socketPath: string;
  latencyMs: number;
}

/**
 * send / send-signed command result
 */
export interface SendResult {
  /** Base64 key the node stored the payload under */
  key: string;
  bytes: number;
  recipients: string[];
  signed: boolean;
}

/**
 * Receive command result
 */
export interface ReceiveResult {
  bytes: number;
  /** Base64 payload, only present in JSON output */
  payload?: string;
  /** File the payload was written to */
  out?: string;
}

/**
 * is-sender command result
 */
export interface IsSenderResult {
  hash: string;
  isSender: boolean;
}

/**
 * participants command result
 */
export interface ParticipantsResult {
  hash: string;
  /** Exactly as returned by the node; an empty list comes back as `[""]` */
  participants: string[];
}

/**
 * start command result
 */
export interface StartResult {
  pid: number | null;
  exitCode: number | null;
  signal: string | null;
}
