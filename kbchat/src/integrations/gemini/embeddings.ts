import { GoogleGenerativeAIEmbeddings } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";
import { LangChainEmbedder } from "../../embedding/embedder.js";
import { requireGoogleApiKey } from "./apiKey.js";

export function createEmbeddings(settings: Settings): GoogleGenerativeAIEmbeddings {
  return new GoogleGenerativeAIEmbeddings({
    apiKey: requireGoogleApiKey(settings),
    model: settings.embeddingModel,
    maxRetries: settings.embeddingMaxRetries
  });
}

export function createEmbedder(settings: Settings): LangChainEmbedder {
  return new LangChainEmbedder({
    embeddings: createEmbeddings(settings),
    model: settings.embeddingModel,
    timeoutMs: settings.embeddingTimeoutMs
  });
}
