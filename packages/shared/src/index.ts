export { BatchProcessor } from './utils/batch-processor';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallConfig,
  type LLMCallResult,
} from './utils/llm-caller';
