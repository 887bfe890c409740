import { describe, expect, it } from "vitest";
import { createRuntime } from "./runtimeFactory";
import { loadEnv } from "../../shared/config/env";

describe("createRuntime", () => {
  it("wires the pipeline and HTTP app from validated configuration", () => {
    const appEnv = loadEnv({
      TAVILY_API_KEY: "test-secret",
      GEMINI_API_KEY: "test-secret",
      RESEARCH_MAX_TURNS: "4",
    });

    const runtime = createRuntime(appEnv);

    expect(runtime.env).toBe(appEnv);
    expect(typeof runtime.pipeline.stream).toBe("function");
    expect(typeof runtime.pipeline.run).toBe("function");
    expect(typeof runtime.app.listen).toBe("function");
  });
});
