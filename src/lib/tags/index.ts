import {
  DEFAULT_TAG_SEPARATOR,
  ParsedTagSpec,
  TAGS_ANNOTATION,
  TAGS_SEPARATOR_ANNOTATION,
  TagSpec,
  VolumeTag,
} from '../../types/claim';

/**
 * Read the tag list and optional separator from claim annotations.
 * Returns undefined when the claim asks for no tags.
 */
export function readTagSpec(annotations: Record<string, string>): TagSpec | undefined {
  const raw = annotations[TAGS_ANNOTATION];
  if (!raw) return undefined;
  const separator = annotations[TAGS_SEPARATOR_ANNOTATION] || DEFAULT_TAG_SEPARATOR;
  return { separator, raw };
}

/**
 * Split `key=value<sep>key=value...` into tags. Tokens that do not contain
 * exactly one `=` are returned in `malformed` and do not stop the batch.
 * Keys and values are kept as written.
 */
export function parseTagSpec(spec: TagSpec): ParsedTagSpec {
  const tags: VolumeTag[] = [];
  const malformed: string[] = [];

  for (const token of spec.raw.split(spec.separator)) {
    const parts = token.split('=');
    if (parts.length !== 2) {
      malformed.push(token);
      continue;
    }
    const [key, value] = parts;
    tags.push({ key, value });
  }

  return { tags, malformed };
}

export function hasTag(tags: VolumeTag[], wanted: VolumeTag): boolean {
  return tags.some((tag) => tag.key === wanted.key && tag.value === wanted.value);
}

export function formatTag(tag: VolumeTag): string {
  return `${tag.key}=${tag.value}`;
}
