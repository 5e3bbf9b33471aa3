import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import type { Project, ProjectSummary } from "./types";
import { createClient } from "@/lib/supabase/client";
import { isSupabaseConfigured } from "@/lib/env";
import { ProjectStoreError } from "@/lib/errors";

export const MAX_LISTED_PROJECTS = 50;

/**
 * Persistence collaborator. Every read and write is scoped by owner.
 *
 * `update` is a compare-and-append: it writes only while the stored project
 * still holds `expectedVersionCount` versions and reports whether it did.
 */
export interface ProjectStore {
  insert(project: Project): Promise<void>;
  load(id: string, ownerId: string): Promise<Project | null>;
  list(ownerId: string): Promise<ProjectSummary[]>;
  update(project: Project, expectedVersionCount: number): Promise<boolean>;
}

export function toSummary(project: Project): ProjectSummary {
  const { currentDocument: _omitted, ...summary } = project;
  return summary;
}

function byUpdatedAtDesc(a: { updatedAt: string }, b: { updatedAt: string }): number {
  return b.updatedAt.localeCompare(a.updatedAt);
}

// ============================================================================
// MEMORY (no Supabase configured, tests)
// ============================================================================

export function createMemoryProjectStore(): ProjectStore {
  const projects = new Map<string, Project>();

  // Copies in and out so callers never share references with the store
  const read = (id: string, ownerId: string): Project | null => {
    const stored = projects.get(id);
    return stored && stored.ownerId === ownerId ? structuredClone(stored) : null;
  };

  return {
    async insert(project) {
      if (projects.has(project.id)) {
        throw new ProjectStoreError(`Project ${project.id} already exists`);
      }
      projects.set(project.id, structuredClone(project));
    },

    async load(id, ownerId) {
      return read(id, ownerId);
    },

    async list(ownerId) {
      return Array.from(projects.values())
        .filter((p) => p.ownerId === ownerId)
        .sort(byUpdatedAtDesc)
        .slice(0, MAX_LISTED_PROJECTS)
        .map((p) => toSummary(structuredClone(p)));
    },

    async update(project, expectedVersionCount) {
      const stored = read(project.id, project.ownerId);
      if (!stored || stored.versions.length !== expectedVersionCount) return false;
      projects.set(project.id, structuredClone(project));
      return true;
    },
  };
}

// ============================================================================
// SUPABASE
// ============================================================================

const versionRowSchema = z.object({
  timestamp: z.string(),
  html: z.string(),
  note: z.string(),
});

const conversationRowSchema = z.object({
  timestamp: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

const projectRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  name: z.string(),
  prompt: z.string(),
  html: z.string(),
  versions: z.array(versionRowSchema).min(1),
  // A malformed entry fails the row: the history is rewritten on every update
  history: z.array(conversationRowSchema),
  version_count: z.number().int(),
  status: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const summaryRowSchema = projectRowSchema.omit({ html: true });

type ProjectRow = z.infer<typeof projectRowSchema>;
type SummaryRow = z.infer<typeof summaryRowSchema>;

const SUMMARY_COLUMNS = "id, user_id, name, prompt, versions, history, version_count, status, created_at, updated_at";

function fromSummaryRow(row: SummaryRow): ProjectSummary {
  return {
    id: row.id,
    ownerId: row.user_id,
    name: row.name,
    prompt: row.prompt,
    versions: row.versions.map(({ timestamp, html, note }) => ({ timestamp, document: html, note })),
    conversation: row.history,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function fromRow(row: ProjectRow): Project {
  return { ...fromSummaryRow(row), currentDocument: row.html };
}

function toRow(project: Project): ProjectRow {
  return {
    id: project.id,
    user_id: project.ownerId,
    name: project.name,
    prompt: project.prompt,
    html: project.currentDocument,
    versions: project.versions.map(({ timestamp, document, note }) => ({ timestamp, html: document, note })),
    history: project.conversation,
    version_count: project.versions.length,
    status: project.status,
    created_at: project.createdAt,
    updated_at: project.updatedAt,
  };
}

function getSupabase(): SupabaseClient {
  const client = createClient();
  if (!client) {
    throw new ProjectStoreError("Supabase not configured");
  }
  return client;
}

export function createSupabaseProjectStore(client: SupabaseClient = getSupabase()): ProjectStore {
  return {
    async insert(project) {
      console.log("[Projects] Saving to cloud:", { id: project.id, name: project.name, ownerId: project.ownerId });

      const { error } = await client.from("projects").insert(toRow(project));

      if (error) {
        console.error("[Projects] Cloud insert error:", { code: error.code, message: error.message });
        throw new ProjectStoreError(error.message);
      }
    },

    async load(id, ownerId) {
      const { data, error } = await client
        .from("projects")
        .select("*")
        .eq("id", id)
        .eq("user_id", ownerId)
        .single();

      if (error) {
        if (error.code === "PGRST116") return null; // Not found
        console.error("[Projects] Cloud load error:", { code: error.code, message: error.message });
        throw new ProjectStoreError(error.message);
      }

      const parsed = projectRowSchema.safeParse(data);
      if (!parsed.success) {
        console.error("[Projects] Malformed project row:", id, parsed.error.issues);
        throw new ProjectStoreError(`Malformed project row ${id}`);
      }
      return fromRow(parsed.data);
    },

    async list(ownerId) {
      const { data, error } = await client
        .from("projects")
        .select(SUMMARY_COLUMNS)
        .eq("user_id", ownerId)
        .order("updated_at", { ascending: false })
        .limit(MAX_LISTED_PROJECTS);

      if (error) {
        console.error("[Projects] Cloud list error:", { code: error.code, message: error.message });
        throw new ProjectStoreError(error.message);
      }

      const rows: unknown[] = data ?? [];
      return rows.flatMap((row) => {
        const parsed = summaryRowSchema.safeParse(row);
        if (!parsed.success) {
          console.error("[Projects] Skipping malformed project row:", parsed.error.issues);
          return [];
        }
        return [fromSummaryRow(parsed.data)];
      });
    },

    async update(project, expectedVersionCount) {
      const { id, user_id, created_at: _createdAt, ...changes } = toRow(project);

      // Optimistic concurrency: the row only matches while nobody appended meanwhile
      const { data, error } = await client
        .from("projects")
        .update(changes)
        .eq("id", id)
        .eq("user_id", user_id)
        .eq("version_count", expectedVersionCount)
        .select("id");

      if (error) {
        console.error("[Projects] Cloud update error:", { code: error.code, message: error.message });
        throw new ProjectStoreError(error.message);
      }

      const updated = Array.isArray(data) && data.length > 0;
      if (updated) {
        console.log("[Projects] Update successful:", { id, versions: changes.version_count });
      }
      return updated;
    },
  };
}

// ============================================================================
// DEFAULT (auto-selects memory vs cloud based on configuration)
// ============================================================================

export function createDefaultProjectStore(): ProjectStore {
  if (isSupabaseConfigured()) {
    console.debug("[Projects] Using Supabase store");
    return createSupabaseProjectStore();
  }
  console.debug("[Projects] Supabase not configured, using in-memory store");
  return createMemoryProjectStore();
}
