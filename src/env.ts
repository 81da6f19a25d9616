import dotenv from "dotenv";

dotenv.config();

export const config = {
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
  // Default model for issue explanations and fix suggestions
  OPENAI_MODEL: process.env.OPENAI_MODEL || "gpt-4o-mini",
  LOG_LEVEL: process.env.LOG_LEVEL,
};
