import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { reportError } from "./error-reporter";
import { ProjectNotFoundError } from "./errors";

describe("reportError", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("logs the error with its context", () => {
    vi.stubEnv("NODE_ENV", "development");
    reportError(new ProjectNotFoundError("p-1"), { operation: "get" });

    expect(console.error).toHaveBeenCalledWith("[Crimson Error]", "Project not found", { operation: "get" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("posts the report in production when an endpoint is configured", () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("ERROR_ENDPOINT", "http://errors.test/report");

    reportError(new ProjectNotFoundError("p-1"), { operation: "get" });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://errors.test/report");
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body)).toMatchObject({
      name: "ProjectNotFoundError",
      message: "Project not found",
      context: { operation: "get" },
    });
  });

  it("skips delivery without an endpoint", () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("ERROR_ENDPOINT", "");

    reportError(new Error("boom"));

    expect(fetchMock).not.toHaveBeenCalled();
  });
});
