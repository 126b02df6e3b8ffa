import { STAGE_TAGS, type StageName } from "@adforge/shared";

export type ArtifactNameParts = {
  projectId: string;
  stage: StageName;
  language?: string;
  colorScheme?: string;
  format?: string;
  timestamp: Date;
  extension: string;
};

// Tags that do not apply to an artifact (a logo has no language) use this value.
const ANY_TAG = "all";

function toTag(value: string | undefined) {
  const tag = (value ?? "")
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return tag || ANY_TAG;
}

/** `{projectId}_{stageTag}_{languageTag}_{colorSchemeTag}_{formatTag}_{unixTimestamp}.{ext}` */
export function canonicalArtifactName(parts: ArtifactNameParts) {
  const seconds = Math.floor(parts.timestamp.getTime() / 1000);
  return [
    toTag(parts.projectId),
    STAGE_TAGS[parts.stage],
    toTag(parts.language),
    toTag(parts.colorScheme),
    toTag(parts.format),
    String(seconds),
  ].join("_") + `.${parts.extension.replace(/^\./, "")}`;
}
