import type {
  BrandInfo,
  ColorScheme,
  ConceptArtifact,
  CopyRecord,
  CreativeBrief,
  FormatConfig,
  LanguageConfig,
} from "@adforge/shared";
import { MAX_BULLET_POINTS } from "@adforge/shared";

const STRICT_SUFFIX = [
  "",
  "Your previous answer could not be parsed.",
  "Reply with ONE JSON object and nothing else: no markdown fences, no comments, no prose.",
  "Use double quotes for every key and string. Do not leave trailing commas.",
].join("\n");

function brandLines(brand: BrandInfo) {
  return [
    `- Name: ${brand.name}`,
    `- Sector: ${brand.sector ?? "not provided"}`,
    `- Audience: ${brand.audience ?? "not provided"}`,
    `- Campaign objective: ${brand.objective ?? "not provided"}`,
    `- Tone of voice: ${brand.tone ?? "not provided"}`,
  ].join("\n");
}

export const REFERENCE_ANALYSIS_INSTRUCTIONS = [
  "Describe this reference advertisement for a designer who must create a new campaign in the same spirit.",
  "Cover the composition, the focal element, the palette (with hex codes), typography and mood.",
  "Answer in at most 200 words.",
].join("\n");

export function conceptSystem(strict: boolean) {
  const base =
    "You are a visual concept strategist for digital advertising. You answer with a single JSON object.";
  return strict ? `${base}\n${STRICT_SUFFIX}` : base;
}

export function conceptPrompt(brief: CreativeBrief, formats: FormatConfig[], referenceAnalysis?: string) {
  const formatKeys = formats.map((format) => `    "${format.id}": "notes for ${format.label}"`).join(",\n");
  return [
    "Create a detailed visual concept for the campaign below.",
    "",
    `BRIEF: "${brief.prompt}"`,
    "",
    "BRAND:",
    brandLines(brief.brand),
    ...(referenceAnalysis ? ["", "REFERENCE ANALYSIS:", referenceAnalysis] : []),
    "",
    "Return JSON with exactly this structure:",
    "{",
    '  "central_idea": "the central idea in one sentence",',
    '  "focal_element": "the most important visual element",',
    '  "supporting_elements": ["supporting", "visual", "elements"],',
    '  "palette": { "primary": "#RRGGBB", "secondary": "#RRGGBB", "accent": "#RRGGBB" },',
    '  "mood": ["three", "to five", "adjectives"],',
    '  "format_notes": {',
    formatKeys,
    "  }",
    "}",
    "",
    "Use real hex codes and pick colors that suit the audience.",
  ].join("\n");
}

export function copySystem(language: LanguageConfig, strict: boolean) {
  const base = `You are a conversion copywriter writing in ${language.name}. You answer with a single JSON object.`;
  return strict ? `${base}\n${STRICT_SUFFIX}` : base;
}

export function copyPrompt(brief: CreativeBrief, concept: ConceptArtifact, language: LanguageConfig) {
  return [
    `Write persuasive advertising copy in ${language.name} for the campaign below.`,
    "",
    "CONCEPT:",
    JSON.stringify(
      {
        central_idea: concept.central_idea,
        focal_element: concept.focal_element,
        mood: concept.mood,
      },
      null,
      2
    ),
    "",
    "BRAND:",
    brandLines(brief.brand),
    "",
    "Guidelines: focus on benefits, use action verbs in calls to action and adapt to the culture of the language.",
    "",
    "Return JSON with exactly this structure:",
    "{",
    '  "headline": "attention-grabbing headline (max 40 chars)",',
    '  "subheading": "main benefit (max 60 chars)",',
    '  "primary_cta": "main call to action (max 20 chars)",',
    '  "secondary_cta": "optional secondary call to action (max 20 chars)",',
    `  "bullet_points": ["up to ${MAX_BULLET_POINTS} short benefits"],`,
    '  "urgency": "urgency or scarcity line (max 30 chars)",',
    '  "legal_footer": "short legal footer text (max 60 chars)"',
    "}",
  ].join("\n");
}

function schemeColors(scheme: ColorScheme) {
  const entries = Object.entries(scheme.colors);
  if (entries.length === 0) {
    return "- Use colors that fit the concept mood";
  }
  return entries.map(([role, hex]) => `- ${role}: ${hex}`).join("\n");
}

export type VisualPromptInput = {
  concept: ConceptArtifact;
  copy: CopyRecord;
  scheme: ColorScheme;
  format: FormatConfig;
};

export function visualPrompt({ concept, copy, scheme, format }: VisualPromptInput) {
  const supporting = concept.supporting_elements.slice(0, 3);
  const formatNote = concept.format_notes[format.id];
  return [
    "Create a modern, professional advertising design.",
    "",
    `MAIN CONCEPT: ${concept.focal_element}`,
    ...(supporting.length > 0 ? [`SUPPORTING ELEMENTS: ${supporting.join(", ")}`] : []),
    ...(concept.mood.length > 0 ? [`MOOD: ${concept.mood.join(", ")}`] : []),
    "",
    "LAYOUT:",
    format.layout,
    ...(formatNote ? [formatNote] : []),
    "",
    "COLOR SCHEME:",
    schemeColors(scheme),
    "- Use white or very light gray behind text for readability",
    "",
    "TEXT ELEMENTS TO INCLUDE:",
    `- Main headline: "${copy.headline}"`,
    ...(copy.subheading ? [`- Subheadline: "${copy.subheading}"`] : []),
    `- Call-to-action button: "${copy.primary_cta}"`,
    "",
    "DESIGN REQUIREMENTS:",
    "- Clean sans-serif typography with high contrast",
    "- Leave the top-right corner free for the logo and the bottom band free for legal text",
    "- Clear visual hierarchy and balanced composition",
    "",
    `SIZE: ${format.width}x${format.height} pixels.`,
  ].join("\n");
}

export function logoPrompt(brand: BrandInfo, size: number) {
  const sector = brand.sector ? ` in the ${brand.sector} sector` : "";
  return [
    `Create a professional, minimalist logo for the brand "${brand.name}"${sector}.`,
    "",
    "REQUIREMENTS:",
    `- Clean, modern and ${brand.tone ?? "professional"} style`,
    "- Simple geometric shapes or clean typography",
    "- High contrast, readable at small sizes",
    "- White background, centered",
    "",
    `SIZE: ${size}x${size} pixels.`,
  ].join("\n");
}

export function footerLines(
  copy: CopyRecord,
  language: LanguageConfig,
  brand: BrandInfo,
  year: number
): string[] {
  const fill = (template: string) =>
    template.replaceAll("{year}", String(year)).replaceAll("{brand}", brand.name);
  return [copy.legal_footer.trim(), fill(language.copyright), fill(language.terms)].filter(
    (line) => line.length > 0
  );
}
