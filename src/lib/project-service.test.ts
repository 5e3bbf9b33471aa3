import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Project } from "./types";
import { createMemoryProjectStore, type ProjectStore } from "./projects";
import { createProjectService } from "./project-service";
import { ConcurrentUpdateError, PreconditionFailedError, ProjectNotFoundError } from "./errors";

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

// Memory store whose first `failures` compare-and-appends report a lost race
function racingStore(failures: number): ProjectStore & { updates: number } {
  const inner = createMemoryProjectStore();
  let remaining = failures;
  return {
    updates: 0,
    insert: (project) => inner.insert(project),
    load: (id, ownerId) => inner.load(id, ownerId),
    list: (ownerId) => inner.list(ownerId),
    async update(project, expected) {
      this.updates++;
      if (remaining > 0) {
        remaining--;
        return false;
      }
      return inner.update(project, expected);
    },
  };
}

describe("project service", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-03-15T12:00:00.000Z"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("creates a project and reads it back for its owner", async () => {
    const service = createProjectService({ store: createMemoryProjectStore() });
    const { projectId, document } = await service.create("user-1", "A bakery landing page");

    const project = await service.get("user-1", projectId);
    expect(project.currentDocument).toBe(document);
    expect(project.name).toBe("A bakery landing page");
    expect(project.conversation.map((entry) => entry.role)).toEqual(["user", "assistant"]);
  });

  it("hides projects from other owners", async () => {
    const service = createProjectService({ store: createMemoryProjectStore() });
    const { projectId } = await service.create("user-1", "A bakery landing page");

    await expect(service.get("user-2", projectId)).rejects.toThrow(ProjectNotFoundError);
    await expect(service.chat("user-2", projectId, "dark mode")).rejects.toThrow(ProjectNotFoundError);
    expect(await service.list("user-2")).toEqual([]);
  });

  it("falls back to the guest owner", async () => {
    const service = createProjectService({ store: createMemoryProjectStore() });
    const { projectId } = await service.create(undefined, "Tea house");

    expect((await service.get(null, projectId)).ownerId).toBe("guest");
    expect((await service.list("")).map((p) => p.id)).toEqual([projectId]);
  });

  it("lists newest projects first without documents", async () => {
    const service = createProjectService({ store: createMemoryProjectStore() });
    const first = await service.create("user-1", "First site");
    vi.setSystemTime(new Date("2026-03-16T12:00:00.000Z"));
    const second = await service.create("user-1", "Second site");

    const listed = await service.list("user-1");
    expect(listed.map((p) => p.id)).toEqual([second.projectId, first.projectId]);
    expect("currentDocument" in listed[0]).toBe(false);
  });

  it("applies a chat edit and records the exchange", async () => {
    const service = createProjectService({ store: createMemoryProjectStore() });
    const { projectId } = await service.create("user-1", "A bakery landing page");

    const { note, document } = await service.chat("user-1", projectId, "add pricing");

    expect(note).toBe("Added pricing section");
    const project = await service.get("user-1", projectId);
    expect(project.currentDocument).toBe(document);
    expect(project.versions.map((v) => v.note)).toEqual(["Initial generation", "Added pricing section"]);
    expect(project.conversation.slice(2).map((entry) => entry.content)).toEqual(["add pricing", "Added pricing section"]);
  });

  it("serializes concurrent chats on the same project", async () => {
    const service = createProjectService({ store: createMemoryProjectStore() });
    const { projectId } = await service.create("user-1", "A bakery landing page");

    await Promise.all([
      service.chat("user-1", projectId, "add pricing"),
      service.chat("user-1", projectId, "add pricing"),
      service.chat("user-1", projectId, "dark mode"),
    ]);

    const project = await service.get("user-1", projectId);
    expect(project.versions).toHaveLength(4);
    expect(project.conversation).toHaveLength(8);
    expect(project.currentDocument).toBe(project.versions[3].document);
    expect(count(project.currentDocument, '<section id="pricing"')).toBe(2);
    expect(project.currentDocument).toContain("#0a0a0a");
  });

  it("retries once after losing a compare-and-append", async () => {
    const store = racingStore(1);
    const service = createProjectService({ store });
    const { projectId } = await service.create("user-1", "A bakery landing page");

    await expect(service.chat("user-1", projectId, "dark mode")).resolves.toEqual(
      expect.objectContaining({ note: "Darkened base colors" })
    );
    expect(store.updates).toBe(2);
    expect((await service.get("user-1", projectId)).versions).toHaveLength(2);
  });

  it("gives up with ConcurrentUpdateError after the retry and reports it", async () => {
    const store = racingStore(2);
    const service = createProjectService({ store });
    const { projectId } = await service.create("user-1", "A bakery landing page");

    await expect(service.chat("user-1", projectId, "dark mode")).rejects.toThrow(ConcurrentUpdateError);
    expect(store.updates).toBe(2);
    expect(console.error).toHaveBeenCalledWith(
      "[Crimson Error]",
      `Project ${projectId} was modified concurrently`,
      { operation: "chat", ownerId: "user-1", projectId }
    );
    expect((await service.get("user-1", projectId)).versions).toHaveLength(1);
  });

  it("surfaces PreconditionFailedError for a corrupted stored project", async () => {
    const inner = createMemoryProjectStore();
    const store: ProjectStore = {
      ...inner,
      load: async (id, ownerId) => {
        const project = await inner.load(id, ownerId);
        return project ? { ...project, currentDocument: "drifted" } : null;
      },
    };
    const service = createProjectService({ store });
    const { projectId } = await service.create("user-1", "A bakery landing page");

    await expect(service.chat("user-1", projectId, "dark mode")).rejects.toThrow(PreconditionFailedError);
  });

  it("stores a manual document replacement as a new version", async () => {
    const service = createProjectService({ store: createMemoryProjectStore() });
    const { projectId } = await service.create("user-1", "A bakery landing page");

    await service.updateDocument("user-1", projectId, "<html>mine</html>");

    const project: Project = await service.get("user-1", projectId);
    expect(project.currentDocument).toBe("<html>mine</html>");
    expect(project.versions.map((v) => v.note)).toEqual(["Initial generation", "Manual edit"]);
    expect(project.conversation).toHaveLength(2);
  });

  it("renders new projects with the configured accent", async () => {
    const service = createProjectService({ store: createMemoryProjectStore(), accentColor: "#123456" });
    const { document } = await service.create("user-1", "Tea house");
    expect(document).toContain(":root { --accent: #123456; }");
  });

  it("keeps the configured accent when a chat regenerates the site", async () => {
    const service = createProjectService({ store: createMemoryProjectStore(), accentColor: "#336699" });
    const { projectId } = await service.create("user-1", "A bakery landing page");

    const { note, document } = await service.chat("user-1", projectId, "I want a retro vibe");

    expect(note).toBe("Regenerated site with new instruction");
    expect(document).toContain(":root { --accent: #336699; }");
    expect(document).not.toContain("#DC143C");
  });
});
