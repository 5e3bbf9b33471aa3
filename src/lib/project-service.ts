import type { Project, ProjectSummary } from "./types";
import { createDefaultProjectStore, type ProjectStore } from "./projects";
import { createProjectLock, type ProjectLock } from "./project-lock";
import { createProject, editProject, replaceDocument, GUEST_OWNER_ID } from "@/lib/site";
import {
  ConcurrentUpdateError,
  PreconditionFailedError,
  ProjectNotFoundError,
  ProjectStoreError,
} from "@/lib/errors";
import { reportError } from "@/lib/error-reporter";
import { readEnv } from "@/lib/env";

// Compare-and-append retries after the first lost race
const MAX_CONFLICT_RETRIES = 1;

export interface ProjectServiceOptions {
  store?: ProjectStore;
  lock?: ProjectLock;
  accentColor?: string;
}

export interface ProjectService {
  create(ownerId: string | null | undefined, prompt: string, name?: string): Promise<{ projectId: string; document: string }>;
  list(ownerId: string | null | undefined): Promise<ProjectSummary[]>;
  get(ownerId: string | null | undefined, projectId: string): Promise<Project>;
  chat(ownerId: string | null | undefined, projectId: string, message: string): Promise<{ note: string; document: string }>;
  updateDocument(ownerId: string | null | undefined, projectId: string, document: string): Promise<void>;
}

function resolveOwner(ownerId: string | null | undefined): string {
  return ownerId || GUEST_OWNER_ID;
}

async function reported<T>(operation: string, context: Record<string, unknown>, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (err) {
    if (
      err instanceof PreconditionFailedError ||
      err instanceof ProjectStoreError ||
      err instanceof ConcurrentUpdateError
    ) {
      reportError(err, { operation, ...context });
    }
    throw err;
  }
}

/**
 * Owner-scoped project operations on top of the site engine.
 * Mutations of one project are serialized by the lock and persisted with
 * compare-and-append, so versions and currentDocument never diverge.
 */
export function createProjectService(options: ProjectServiceOptions = {}): ProjectService {
  const store = options.store ?? createDefaultProjectStore();
  const lock = options.lock ?? createProjectLock();
  const accentColor = options.accentColor ?? readEnv().accentColor;

  async function load(ownerId: string, projectId: string): Promise<Project> {
    const project = await store.load(projectId, ownerId);
    if (!project) throw new ProjectNotFoundError(projectId);
    return project;
  }

  async function mutate<R extends { project: Project }>(
    ownerId: string,
    projectId: string,
    change: (current: Project) => R
  ): Promise<R> {
    return lock.run(projectId, async () => {
      for (let attempt = 0; attempt <= MAX_CONFLICT_RETRIES; attempt++) {
        const current = await load(ownerId, projectId);
        const result = change(current);
        if (await store.update(result.project, current.versions.length)) {
          return result;
        }
        console.debug(`[Projects] Concurrent modification on ${projectId}, retrying...`);
      }
      throw new ConcurrentUpdateError(projectId);
    });
  }

  return {
    async create(ownerId, prompt, name) {
      const owner = resolveOwner(ownerId);
      return reported("create", { ownerId: owner }, async () => {
        const { project, document } = createProject(prompt, { name, ownerId: owner, accentColor });
        await store.insert(project);
        console.log("[Projects] Created:", { id: project.id, name: project.name, ownerId: owner });
        return { projectId: project.id, document };
      });
    },

    async list(ownerId) {
      const owner = resolveOwner(ownerId);
      return reported("list", { ownerId: owner }, () => store.list(owner));
    },

    async get(ownerId, projectId) {
      const owner = resolveOwner(ownerId);
      return reported("get", { ownerId: owner, projectId }, () => load(owner, projectId));
    },

    async chat(ownerId, projectId, message) {
      const owner = resolveOwner(ownerId);
      return reported("chat", { ownerId: owner, projectId }, async () => {
        const { note, document } = await mutate(owner, projectId, (current) =>
          editProject(current, message, { accentColor })
        );
        return { note, document };
      });
    },

    async updateDocument(ownerId, projectId, document) {
      const owner = resolveOwner(ownerId);
      await reported("updateDocument", { ownerId: owner, projectId }, () =>
        mutate(owner, projectId, (current) => replaceDocument(current, document))
      );
    },
  };
}
