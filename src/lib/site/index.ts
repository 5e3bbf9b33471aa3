/**
 * Site engine: prompt-to-document synthesis and chat-driven edits.
 */

export { createProject, editProject, replaceDocument, getRenderableDocument, deriveProjectName, GUEST_OWNER_ID } from "./engine";
export type { CreateProjectOptions, CreateProjectResult, EditProjectOptions, EditProjectResult } from "./engine";

export { extractSeoMetadata } from "./seo";
export { synthesizeDocument, DEFAULT_ACCENT_COLOR, isHexColor, resolveAccentColor } from "./synthesize";
export { classifyInstruction, INSTRUCTION_RULES } from "./instructions";
export type { InstructionRule } from "./instructions";
export { applyTransformation, NOTES } from "./transformations";
export { recordCreation, recordEdit, recordManualEdit, assertProjectInvariants } from "./history";
