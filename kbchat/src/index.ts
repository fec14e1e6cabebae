export { handleChatRequest, isChatFailure } from "./chat/chatRequest.js";
export type { ChatFailure, ChatRequest, ChatResponse, ChatSuccess } from "./chat/chatRequest.js";
export { loadSettings, validateChunking, MIN_CONTEXT_SIZE } from "./config/settings.js";
export type { Settings } from "./config/settings.js";
export { LangChainEmbedder } from "./embedding/embedder.js";
export type { Embedder } from "./embedding/embedder.js";
export {
  ConfigurationError,
  DimensionMismatchError,
  EmbeddingError,
  ErrorCode,
  GenerationError,
  KbChatError,
  LoaderError,
  TimeoutError,
  getErrorCode,
  getErrorMessage
} from "./errors.js";
export { FileDocumentLoader } from "./loaders/documentLoader.js";
export type { DocumentLoader } from "./loaders/documentLoader.js";
export { createLogger, silentLogger } from "./logging/logger.js";
export type { Logger, LogLevel } from "./logging/logger.js";
export { appendChatHistory, loadChatHistory } from "./memory/chatHistoryStore.js";
export type { ChatTurn } from "./memory/chatHistoryStore.js";
export { answerQuestion } from "./rag/answer.js";
export type { AnswerDependencies, AnswerResult } from "./rag/answer.js";
export { ChatModelAnswerGenerator } from "./rag/answerGenerator.js";
export type { AnswerGenerator, GenerateInput } from "./rag/answerGenerator.js";
export { assembleContext, NO_CONTEXT_MARKER, TRUNCATION_MARKER } from "./rag/context.js";
export { buildIndex } from "./rag/ingest.js";
export { KnowledgeBase } from "./rag/knowledgeBase.js";
export { createRuntime } from "./rag/runtime.js";
export type { Backends, Runtime } from "./rag/runtime.js";
export { Retriever } from "./retrieval/retriever.js";
export { VectorIndex } from "./retrieval/vectorIndex.js";
export type {
  Chunk,
  ContextBundle,
  Embedding,
  IndexEntry,
  RankedResult,
  SourceDocument
} from "./retrieval/types.js";
export { SlidingWindowTextSplitter } from "./splitting/slidingWindowSplitter.js";
