import { randomUUID } from "node:crypto";
import type { Project, ProjectVersion, TransformationKind } from "@/lib/types";
import {
  assertProjectInvariants,
  recordCreation,
  recordEdit,
  recordManualEdit,
} from "./history";
import { classifyInstruction } from "./instructions";
import { truncate } from "./seo";
import { resolveAccentColor, synthesizeDocument } from "./synthesize";
import { applyTransformation } from "./transformations";

export const GUEST_OWNER_ID = "guest";
const MAX_NAME_LENGTH = 40;

export interface CreateProjectOptions {
  name?: string;
  ownerId?: string;
  accentColor?: string;
  id?: string;
  now?: Date;
}

export interface CreateProjectResult {
  project: Project;
  document: string;
  initialVersion: ProjectVersion;
}

export interface EditProjectOptions {
  now?: Date;
  // Used when the instruction falls through to a full regeneration
  accentColor?: string;
}

export interface EditProjectResult {
  project: Project;
  document: string;
  note: string;
  kind: TransformationKind;
}

export function deriveProjectName(prompt: string): string {
  const shortened = truncate(prompt, MAX_NAME_LENGTH);
  return shortened === prompt ? prompt : `${shortened}…`;
}

export function createProject(prompt: string, options: CreateProjectOptions = {}): CreateProjectResult {
  const document = synthesizeDocument(prompt, resolveAccentColor(options.accentColor));
  const project = recordCreation(
    {
      id: options.id ?? randomUUID(),
      ownerId: options.ownerId || GUEST_OWNER_ID,
      name: options.name || deriveProjectName(prompt),
    },
    document,
    prompt,
    options.now ?? new Date()
  );

  return { project, document, initialVersion: project.versions[0] };
}

/**
 * Interpret a chat instruction and record the result as a new version.
 * Throws PreconditionFailedError when `project` breaks the data model.
 */
export function editProject(
  project: Project,
  instruction: string,
  options: EditProjectOptions = {}
): EditProjectResult {
  const current = assertProjectInvariants(project);
  const kind = classifyInstruction(instruction);
  const { document, note } = applyTransformation(kind, current, instruction, options.accentColor);

  console.debug(`[Engine] ${current.id}: ${kind.type}${kind.keyword ? ` ("${kind.keyword}")` : ""}`);

  return {
    project: recordEdit(current, instruction, document, note, options.now ?? new Date()),
    document,
    note,
    kind,
  };
}

// Direct replacement of the markup (code editor save); no conversation entry
export function replaceDocument(
  project: Project,
  document: string,
  options: { now?: Date } = {}
): { project: Project; document: string } {
  const current = assertProjectInvariants(project);
  return { project: recordManualEdit(current, document, options.now ?? new Date()), document };
}

export function getRenderableDocument(project: Project): string {
  return project.currentDocument;
}
