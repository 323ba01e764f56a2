/**
 * Test utilities - Re-export all test helpers
 *
 * ```ts
 * import { StubNode, writeFakeNodeBinary } from '@/__testutils__/index.js';
 * ```
 */

export { StubNode, type RecordedRequest, type StubHandler, type StubReply } from './StubNode.js';
export { writeFakeNodeBinary, type FakeNodeBinary } from './fakeNodeBinary.js';
export { collectStream } from './collectStream.js';
