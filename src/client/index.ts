/**
 * Public API of relayctl.
 *
 * @example
 * ```typescript
 * import { createClient, launchNode, TransactionHash } from 'relayctl';
 *
 * const node = await launchNode('./node.conf', { readiness: { socketPath: './node.ipc' } });
 * const client = createClient('./node.ipc');
 * const key = await client.sendPayload(payload, undefined, [recipientKey]);
 * ```
 */

export { createClient, PayloadClient } from './PayloadClient.js';
export { probe } from './health.js';
export { TransactionHash } from './TransactionHash.js';
export {
  decodeBase64,
  encodeBase64,
  escapePathSegment,
  joinRecipients,
  participantToBase64,
  splitParticipants,
  type ParticipantKey,
} from './encoding.js';

export * from '@/transport/index.js';
export { launchNode, stopNode, type LaunchOptions, type ReadinessOptions } from '@/node/supervisor.js';
