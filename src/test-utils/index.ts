/**
 * Test Utilities Module
 *
 * Shared fakes for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { FakeEmbeddingService } from '../../test-utils/index.js';
 *
 * const embedder = new FakeEmbeddingService(['refund', 'card']);
 * ```
 */

export {
  FakeEmbeddingService,
  FakeCompletionService,
  type RecordedCompletion,
} from './fakes.js';

export {
  createFakeChatbot,
  TEST_ARTICLES,
  TEST_SETTINGS,
  TEST_VOCABULARY,
  type FakeChatbotOptions,
  type ReadyInit,
} from './chatbot.js';

export { createRecordingContext, stripAnsi, type RecordingContext } from './cli.js';
