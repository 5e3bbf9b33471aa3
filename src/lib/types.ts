export type ConversationRole = "user" | "assistant";

export interface ConversationEntry {
  timestamp: string; // ISO-8601
  role: ConversationRole;
  content: string;
}

// Immutable snapshot of a generated document
export interface ProjectVersion {
  timestamp: string; // ISO-8601
  document: string;
  note: string;
}

export interface Project {
  id: string;
  ownerId: string;
  name: string;
  prompt: string; // original input, never rewritten
  currentDocument: string;
  versions: ProjectVersion[]; // index 0 = initial generation
  conversation: ConversationEntry[];
  status: string; // lifecycle tag, "draft" until a collaborator changes it
  createdAt: string;
  updatedAt: string;
}

// Listing view (document bodies stripped)
export type ProjectSummary = Omit<Project, "currentDocument">;

export interface SeoMetadata {
  title: string;
  description: string;
  keywords: string; // comma-separated
}

export type TransformationType =
  | "sci_fi_theme"
  | "dark_mode"
  | "add_pricing"
  | "accent_recolor"
  | "regenerate";

export type TransformationKind =
  | { type: Exclude<TransformationType, "regenerate">; keyword: string }
  | { type: "regenerate"; keyword: null };

export interface TransformationResult {
  document: string;
  note: string;
}
