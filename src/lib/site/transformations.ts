import type { Project, TransformationKind, TransformationResult } from "@/lib/types";
import {
  BASE_BACKGROUND,
  DEFAULT_ACCENT_COLOR,
  GLOW_COLOR,
  MAIN_CLOSE,
  MARKETING_PHRASE,
  synthesizeDocument,
} from "./synthesize";

export const NOTES = {
  sci_fi_theme: "Applied sci-fi theme",
  dark_mode: "Darkened base colors",
  add_pricing: "Added pricing section",
  accent_recolor: "Adjusted accent color",
  regenerate: "Regenerated site with new instruction",
} as const;

export const PRICING_SECTION = `
<section id="pricing" class="max-w-6xl mx-auto px-6 pb-24">
  <h2 class="text-2xl font-bold mb-6">Pricing</h2>
  <div class="grid md:grid-cols-3 gap-6">
    <div class="glass rounded-2xl p-6"><h3 class="font-semibold">Starter</h3><p class="text-4xl font-extrabold mt-2">$0</p><p class="text-white/70 mt-2">For experiments</p></div>
    <div class="glass rounded-2xl p-6 border border-white/20"><h3 class="font-semibold">Pro</h3><p class="text-4xl font-extrabold mt-2">$19</p><p class="text-white/70 mt-2">For builders</p></div>
    <div class="glass rounded-2xl p-6"><h3 class="font-semibold">Scale</h3><p class="text-4xl font-extrabold mt-2">$99</p><p class="text-white/70 mt-2">For teams</p></div>
  </div>
</section>
`;

type Replacement = readonly [search: string, replace: string];

// Literal, replace-all; a missing marker leaves the document untouched
function replaceMarkers(document: string, replacements: readonly Replacement[]): string {
  return replacements.reduce((doc, [search, replace]) => doc.split(search).join(replace), document);
}

export function combinePrompt(prompt: string, instruction: string): string {
  return `${prompt} — ${instruction}`;
}

export function applyTransformation(
  kind: TransformationKind,
  project: Project,
  instruction: string,
  accentColor: string = DEFAULT_ACCENT_COLOR
): TransformationResult {
  const current = project.currentDocument;

  switch (kind.type) {
    case "sci_fi_theme":
      return {
        document: replaceMarkers(current, [
          [BASE_BACKGROUND, "#05060a"],
          [GLOW_COLOR, "rgba(56,189,248,0.18)"],
          [MARKETING_PHRASE, "Sci‑fi neon aesthetic with holographic accents"],
        ]),
        note: NOTES.sci_fi_theme,
      };

    case "dark_mode":
      return {
        document: replaceMarkers(current, [[BASE_BACKGROUND, "#0a0a0a"]]),
        note: NOTES.dark_mode,
      };

    // Not deduplicated: every application inserts another copy
    case "add_pricing":
      return {
        document: replaceMarkers(current, [[MAIN_CLOSE, `${PRICING_SECTION}\n    ${MAIN_CLOSE}`]]),
        note: NOTES.add_pricing,
      };

    case "accent_recolor":
      return {
        document: replaceMarkers(current, [[`--accent: ${DEFAULT_ACCENT_COLOR}`, "--accent: #b80f2a"]]),
        note: NOTES.accent_recolor,
      };

    case "regenerate":
      return {
        document: synthesizeDocument(combinePrompt(project.prompt, instruction), accentColor),
        note: NOTES.regenerate,
      };
  }
}
