import type { Settings } from "../../config/settings.js";
import { ConfigurationError } from "../../errors.js";

export function requireGoogleApiKey(settings: Settings): string {
  if (!settings.googleApiKey) {
    throw new ConfigurationError("GOOGLE_API_KEY (or GEMINI_API_KEY) is required");
  }
  return settings.googleApiKey;
}
