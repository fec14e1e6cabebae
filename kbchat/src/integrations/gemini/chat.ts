import { ChatGoogleGenerativeAI } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";
import { requireGoogleApiKey } from "./apiKey.js";

export function createChatModel(settings: Settings): ChatGoogleGenerativeAI {
  return new ChatGoogleGenerativeAI({
    apiKey: requireGoogleApiKey(settings),
    model: settings.chatModel,
    temperature: settings.temperature,
    maxRetries: 0
  });
}
