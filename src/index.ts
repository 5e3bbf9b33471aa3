export * from "@/lib/site";
export { createProjectService } from "@/lib/project-service";
export type { ProjectService, ProjectServiceOptions } from "@/lib/project-service";
export {
  createMemoryProjectStore,
  createSupabaseProjectStore,
  createDefaultProjectStore,
  toSummary,
} from "@/lib/projects";
export type { ProjectStore } from "@/lib/projects";
export { createProjectLock } from "@/lib/project-lock";
export type { ProjectLock } from "@/lib/project-lock";
export {
  SiteEngineError,
  PreconditionFailedError,
  ProjectNotFoundError,
  ConcurrentUpdateError,
  ProjectStoreError,
} from "@/lib/errors";
export type * from "@/lib/types";
