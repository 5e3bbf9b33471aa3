export class SiteEngineError extends Error {
  status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * A project value handed to the engine breaks the data model
 * (empty history, current document out of sync with the last version, ...).
 * Points at a caller or storage bug, never at user input.
 */
export class PreconditionFailedError extends SiteEngineError {
  issues: string[];

  constructor(issues: string[]) {
    super(`Project violates data model: ${issues.join("; ")}`, 500);
    this.issues = issues;
  }
}

export class ProjectNotFoundError extends SiteEngineError {
  projectId: string;

  constructor(projectId: string) {
    super("Project not found", 404);
    this.projectId = projectId;
  }
}

// Compare-and-append lost twice in a row
export class ConcurrentUpdateError extends SiteEngineError {
  projectId: string;

  constructor(projectId: string) {
    super(`Project ${projectId} was modified concurrently`, 409);
    this.projectId = projectId;
  }
}

export class ProjectStoreError extends SiteEngineError {
  constructor(message: string) {
    super(message, 500);
  }
}
