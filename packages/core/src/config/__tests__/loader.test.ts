import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { deepMerge, findProjectConfig, loadConfig, parseEnvConfig } from "../loader.js";

describe("deepMerge", () => {
  it("merges nested objects with later sources winning", () => {
    expect(deepMerge({ a: 1, b: { c: 2, d: 3 } }, { b: { d: 4 } }, { e: [1] })).toEqual({
      a: 1,
      b: { c: 2, d: 4 },
      e: [1],
    });
  });

  it("replaces arrays and ignores undefined", () => {
    expect(deepMerge({ list: [1, 2], keep: "x" }, { list: [3], keep: undefined })).toEqual({
      list: [3],
      keep: "x",
    });
  });
});

describe("parseEnvConfig", () => {
  it("maps TESSERA_* variables onto nested keys", () => {
    const env = {
      TESSERA_OLLAMA_BASE_URL: "http://gpu-box:11434",
      TESSERA_AZURE_OPENAI_API_KEY: "test-secret",
      TESSERA_LOG_LEVEL: "debug",
      TESSERA_PINECONE_INDEX: "",
      UNRELATED: "x",
    };

    expect(parseEnvConfig(env)).toEqual({
      ollama: { baseUrl: "http://gpu-box:11434" },
      azureOpenAi: { apiKey: "test-secret" },
      logLevel: "debug",
    });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tessera-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies defaults when nothing is configured", () => {
    const result = loadConfig({ cwd: dir, env: {}, skipProjectFile: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.logLevel).toBe("info");
    expect(result.value.azureOpenAi.deploymentName).toBe("gpt-35-turbo");
    expect(result.value.azureOpenAi.temperature).toBe(0.7);
    expect(result.value.ollama.baseUrl).toBe("http://localhost:11434");
    expect(result.value.pinecone.metadataTextKey).toBe("text_segment");
  });

  it("finds tessera.toml in a parent directory", async () => {
    await writeFile(
      join(dir, "tessera.toml"),
      ['logLevel = "warn"', "", "[ollama]", 'modelName = "llama3"', "timeout = 5000"].join("\n")
    );
    const nested = join(dir, "a", "b");
    await mkdir(nested, { recursive: true });

    expect(findProjectConfig(nested)).toBe(join(dir, "tessera.toml"));

    const result = loadConfig({ cwd: nested, env: {} });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.logLevel).toBe("warn");
    expect(result.value.ollama.modelName).toBe("llama3");
    expect(result.value.ollama.timeout).toBe(5000);
  });

  it("layers file < env < overrides", async () => {
    await writeFile(join(dir, "tessera.toml"), '[pinecone]\nindex = "from-file"\nnamespace = "file-ns"\n');

    const result = loadConfig({
      cwd: dir,
      env: { TESSERA_PINECONE_INDEX: "from-env", TESSERA_PINECONE_NAMESPACE: "env-ns" },
      overrides: { pinecone: { namespace: "override-ns" } },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.pinecone.index).toBe("from-env");
    expect(result.value.pinecone.namespace).toBe("override-ns");
  });

  it("ignores the environment when asked", () => {
    const result = loadConfig({
      cwd: dir,
      skipProjectFile: true,
      skipEnv: true,
      env: { TESSERA_LOG_LEVEL: "error" },
    });

    expect(result.ok && result.value.logLevel).toBe("info");
  });

  it("reports TOML syntax errors", async () => {
    await writeFile(join(dir, "tessera.toml"), "logLevel = = broken");

    const result = loadConfig({ cwd: dir, env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("PARSE_ERROR");
    expect(result.error.path).toBe(join(dir, "tessera.toml"));
  });

  it("reports schema violations", () => {
    const result = loadConfig({
      cwd: dir,
      skipProjectFile: true,
      env: { TESSERA_LOG_LEVEL: "loud" },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("VALIDATION_ERROR");
    expect(result.error.message).toMatch(/^Invalid configuration: logLevel: /);
  });

  it("rejects an invalid endpoint URL", () => {
    const result = loadConfig({
      skipProjectFile: true,
      env: {},
      overrides: { azureOpenAi: { endpoint: "not a url" } },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toContain("azureOpenAi.endpoint");
  });
});
