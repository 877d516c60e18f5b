/**
 * Vitest Global Setup
 *
 * Keeps adapter tests hermetic: no TESSERA_* or vendor variables leak in from
 * the developer's shell.
 */
import { beforeEach } from "vitest";

const LEAKY_ENV_PREFIXES = ["TESSERA_", "AZURE_OPENAI_", "OPENAI_", "OLLAMA_", "PINECONE_"];

beforeEach(() => {
  for (const key of Object.keys(process.env)) {
    if (LEAKY_ENV_PREFIXES.some((prefix) => key.startsWith(prefix))) {
      delete process.env[key];
    }
  }
});
