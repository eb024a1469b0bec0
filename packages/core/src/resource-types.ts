import { ok, reject } from "./rules.js";
import type { ContentType, Outcome, ResourceType } from "./types.js";

type MappedContentType = Exclude<ContentType, "all" | UnsupportedContentType>;
type UnsupportedContentType = "object" | "object-subrequest" | "webrtc";

const RESOURCE_TYPES: Record<MappedContentType, ResourceType> = {
  image: "image",
  stylesheet: "style-sheet",
  script: "script",
  media: "media",
  xmlhttprequest: "raw",
  other: "raw",
  websocket: "raw",
  ping: "raw",
  font: "font",
  subdocument: "document",
  document: "document"
};

const UNSUPPORTED_CONTENT_TYPES: readonly ContentType[] = ["object", "object-subrequest", "webrtc"];

/** Content types an unrestricted rule stands for when some of them are excluded. */
const DEFAULT_CONTENT_TYPES: readonly MappedContentType[] = [
  "image",
  "stylesheet",
  "script",
  "media",
  "xmlhttprequest",
  "other",
  "websocket",
  "ping",
  "font"
];

/**
 * Resolves the `resource-type` list for a network rule. `undefined` means the
 * trigger applies to every resource.
 */
export function mapResourceTypes(
  permitted: readonly ContentType[],
  restricted: readonly ContentType[],
  isReplace: boolean
): Outcome<ResourceType[] | undefined> {
  const unsupported = permitted.find((type) => UNSUPPORTED_CONTENT_TYPES.includes(type));
  if (unsupported) {
    return reject("unsupported-content-type", `Content type $${unsupported} has no resource-type equivalent.`);
  }

  if (isReplace) {
    return reject("replace-rule", "Rules rewriting the response body ($replace) cannot be converted.");
  }

  const unrestricted = permitted.length === 0 || permitted.includes("all");
  if (unrestricted && restricted.length === 0) {
    return ok(undefined);
  }

  const declared = unrestricted ? DEFAULT_CONTENT_TYPES : permitted.filter(isMappedContentType);
  const remaining = declared.filter((type) => !restricted.includes(type));

  if (unrestricted && remaining.length === DEFAULT_CONTENT_TYPES.length) {
    return ok(undefined);
  }

  const resourceTypes = new Set<ResourceType>();
  for (const type of remaining) {
    resourceTypes.add(RESOURCE_TYPES[type]);
  }

  if (resourceTypes.size === 0) {
    return reject("unsupported-content-type", "No content types remain after exclusions.");
  }

  return ok(Array.from(resourceTypes));
}

function isMappedContentType(type: ContentType): type is MappedContentType {
  return type !== "all" && !UNSUPPORTED_CONTENT_TYPES.includes(type);
}
