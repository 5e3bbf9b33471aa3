import { z } from "zod";
import { PreconditionFailedError } from "@/lib/errors";
import type { ConversationEntry, Project, ProjectVersion } from "@/lib/types";

export const INITIAL_VERSION_NOTE = "Initial generation";
export const INITIAL_ASSISTANT_MESSAGE = "Generated initial site";
export const MANUAL_EDIT_NOTE = "Manual edit";

const versionSchema = z.object({
  timestamp: z.string(),
  document: z.string(),
  note: z.string(),
});

const conversationEntrySchema = z.object({
  timestamp: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

export const projectSchema = z
  .object({
    id: z.string().min(1),
    ownerId: z.string().min(1),
    name: z.string(),
    prompt: z.string(),
    currentDocument: z.string(),
    versions: z.array(versionSchema).min(1, "versions must not be empty"),
    conversation: z.array(conversationEntrySchema),
    status: z.string(),
    createdAt: z.string(),
    updatedAt: z.string(),
  })
  .superRefine((project, ctx) => {
    const latest = project.versions[project.versions.length - 1];
    if (latest && latest.document !== project.currentDocument) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["currentDocument"],
        message: "currentDocument does not match the latest version",
      });
    }
  });

/**
 * Validate a project handed over by a collaborator.
 * Throws PreconditionFailedError listing every violated rule.
 */
export function assertProjectInvariants(value: unknown): Project {
  const result = projectSchema.safeParse(value);
  if (!result.success) {
    throw new PreconditionFailedError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "project"}: ${issue.message}`)
    );
  }
  return result.data;
}

export interface ProjectSeed {
  id: string;
  ownerId: string;
  name: string;
  status?: string;
}

export function recordCreation(seed: ProjectSeed, document: string, prompt: string, now: Date): Project {
  const timestamp = now.toISOString();
  return {
    id: seed.id,
    ownerId: seed.ownerId,
    name: seed.name,
    prompt,
    currentDocument: document,
    versions: [{ timestamp, document, note: INITIAL_VERSION_NOTE }],
    conversation: [
      { timestamp, role: "user", content: prompt },
      { timestamp, role: "assistant", content: INITIAL_ASSISTANT_MESSAGE },
    ],
    status: seed.status ?? "draft",
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

// Returns a new value; the input project is never touched, so a reader
// sees either all of the appends or none of them.
export function recordEdit(
  project: Project,
  instruction: string,
  document: string,
  note: string,
  now: Date
): Project {
  const timestamp = now.toISOString();
  const exchange: ConversationEntry[] = [
    { timestamp, role: "user", content: instruction },
    { timestamp, role: "assistant", content: note },
  ];
  const version: ProjectVersion = { timestamp, document, note };

  return {
    ...project,
    currentDocument: document,
    versions: [...project.versions, version],
    conversation: [...project.conversation, ...exchange],
    updatedAt: timestamp,
  };
}

export function recordManualEdit(project: Project, document: string, now: Date): Project {
  const timestamp = now.toISOString();
  return {
    ...project,
    currentDocument: document,
    versions: [...project.versions, { timestamp, document, note: MANUAL_EDIT_NOTE }],
    updatedAt: timestamp,
  };
}
