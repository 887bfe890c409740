import { describe, expect, it } from "vitest";
import { err, ok } from "neverthrow";
import {
  createWebSearchTool,
  formatSearchHits,
  NO_RESULTS_SENTINEL,
  RESEARCHER_CONFIG,
  ResearchStage,
} from "./researchStage";
import { ToolLoopRunner } from "../services/toolLoopRunner";
import type {
  GenerationPort,
  GenerationRequest,
  GenerationResponse,
  WebSearchPort,
  WebSearchRequest,
} from "../../core/ports/outboundPorts";

const scriptedGeneration = (responses: GenerationResponse[]) => {
  const requests: GenerationRequest[] = [];
  const generation: GenerationPort = {
    generate: async (request) => {
      requests.push(request);
      const next = responses.at(requests.length - 1);
      if (!next) {
        throw new Error(`unexpected generation call #${requests.length}`);
      }
      return ok(next);
    },
  };
  return { generation, requests };
};

describe("formatSearchHits", () => {
  it("joins hits with the separator", () => {
    expect(
      formatSearchHits([
        { title: "A", url: "https://a.example", content: "alpha" },
        { title: "B", url: "https://b.example", content: "beta" },
      ]),
    ).toBe(
      "Title: A\nURL: https://a.example\nContent: alpha\n\n---\nTitle: B\nURL: https://b.example\nContent: beta\n",
    );
  });

  it("returns the sentinel for zero hits", () => {
    expect(formatSearchHits([])).toBe("No results found.");
  });
});

describe("createWebSearchTool", () => {
  it("searches with the configured result limit", async () => {
    const searches: WebSearchRequest[] = [];
    const search: WebSearchPort = {
      search: async (request) => {
        searches.push(request);
        return ok([{ title: "T", url: "https://t.example", content: "c" }]);
      },
    };

    const output = await createWebSearchTool(search, 3).execute({
      query: "office vacancy",
    });

    expect(searches).toEqual([{ query: "office vacancy", maxResults: 3 }]);
    expect(output.isOk()).toBe(true);
    if (output.isErr()) {
      throw new Error(output.error.message);
    }
    expect(output.value).toBe("Title: T\nURL: https://t.example\nContent: c\n");
  });

  it("reports invalid arguments back without searching", async () => {
    let searched = false;
    const search: WebSearchPort = {
      search: async () => {
        searched = true;
        return ok([]);
      },
    };

    const output = await createWebSearchTool(search).execute({ query: 42 });

    expect(searched).toBe(false);
    expect(output.isOk()).toBe(true);
    if (output.isErr()) {
      throw new Error(output.error.message);
    }
    expect(output.value).toBe(
      "Invalid arguments for web_search: query: Expected string, received number",
    );
  });
});

describe("ResearchStage", () => {
  it("returns the synthesized text verbatim after searching", async () => {
    const search: WebSearchPort = {
      search: async () => ok([]),
    };
    const { generation, requests } = scriptedGeneration([
      {
        text: "",
        toolCalls: [{ name: "web_search", args: { query: "remote work" } }],
      },
      { text: "  Remote work reduces office demand...\n", toolCalls: [] },
    ]);

    const stage = new ResearchStage(
      new ToolLoopRunner(generation, 5),
      createWebSearchTool(search),
    );
    const result = await stage.run("impact of remote work");

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toBe("  Remote work reduces office demand...\n");
    expect(requests[0]?.config.systemInstruction).toBe(
      RESEARCHER_CONFIG.systemInstruction,
    );
    expect(requests[0]?.config.temperature).toBe(0.4);
    expect(requests[1]?.messages.at(-1)).toEqual({
      role: "tool",
      results: [{ name: "web_search", output: NO_RESULTS_SENTINEL }],
    });
  });

  it("fails with EmptyUpstreamResult when the model returns no text", async () => {
    const { generation } = scriptedGeneration([{ text: "   ", toolCalls: [] }]);
    const stage = new ResearchStage(
      new ToolLoopRunner(generation, 5),
      createWebSearchTool({ search: async () => ok([]) }),
    );

    const result = await stage.run("query");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected empty result failure");
    }
    expect(result.error).toEqual({
      kind: "EmptyUpstreamResult",
      stage: "research",
      message: "Research returned no text.",
    });
  });

  it("maps search failures to UpstreamUnavailable", async () => {
    const { generation } = scriptedGeneration([
      { text: "", toolCalls: [{ name: "web_search", args: { query: "q" } }] },
    ]);
    const search: WebSearchPort = {
      search: async () =>
        err({
          source: "search",
          code: "provider_error",
          provider: "tavily",
          message: "HTTP request failed with status 502.",
          retryable: true,
          httpStatus: 502,
        }),
    };

    const result = await new ResearchStage(
      new ToolLoopRunner(generation, 5),
      createWebSearchTool(search),
    ).run("query");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected upstream failure");
    }
    expect(result.error.kind).toBe("UpstreamUnavailable");
    expect(result.error.stage).toBe("research");
    expect(result.error.message).toBe(
      "tavily search call failed (provider_error): HTTP request failed with status 502.",
    );
  });
});
