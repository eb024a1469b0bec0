export type ContentType =
  | "all"
  | "image"
  | "stylesheet"
  | "script"
  | "media"
  | "xmlhttprequest"
  | "other"
  | "websocket"
  | "ping"
  | "font"
  | "subdocument"
  | "document"
  | "object"
  | "object-subrequest"
  | "webrtc";

export type RuleType = "network" | "css-hide" | "extended-css-hide" | "script-inject" | "scriptlet-inject";

interface RuleBase {
  ruleText: string;
  permittedDomains: string[];
  restrictedDomains: string[];
  isAllowlist: boolean;
}

export interface NetworkRule extends RuleBase {
  type: "network";
  urlPattern: string;
  /** Body of a `/regex/` rule, or the canonical regex the parser derived from `urlPattern`. */
  urlRegExpSource?: string;
  permittedContentTypes: ContentType[];
  restrictedContentTypes: ContentType[];
  isCheckThirdParty: boolean;
  isThirdParty: boolean;
  isMatchCase: boolean;
  isDocumentAllowlist: boolean;
  isReplace: boolean;
}

export interface CssRule extends RuleBase {
  type: "css-hide" | "extended-css-hide";
  cssSelector: string;
}

export interface ScriptRule extends RuleBase {
  type: "script-inject";
  script: string;
}

export interface ScriptletRule extends RuleBase {
  type: "scriptlet-inject";
  scriptlet: string;
  scriptletParam: string;
}

export type CosmeticRule = CssRule | ScriptRule | ScriptletRule;
export type Rule = NetworkRule | CosmeticRule;

export type ResourceType = "image" | "style-sheet" | "script" | "media" | "raw" | "font" | "document";
export type LoadType = "first-party" | "third-party";

export interface Trigger {
  urlFilter: string;
  ifDomain?: string[];
  unlessDomain?: string[];
  resourceType?: ResourceType[];
  loadType?: [LoadType];
  caseSensitive?: boolean;
}

export type ActionType = "block" | "css-display-none" | "css" | "script" | "scriptlet" | "ignore-previous-rules";

export interface Action {
  type: ActionType;
  selector?: string;
  css?: string;
  script?: string;
  scriptlet?: string;
  scriptletParam?: string;
}

export interface BlockerEntry {
  readonly trigger: Readonly<Trigger>;
  readonly action: Readonly<Action>;
}

export type RejectReason =
  | "unsupported-regex"
  | "conflicting-domains"
  | "unsupported-content-type"
  | "replace-rule"
  | "unsafe-css"
  | "advanced-blocking-disabled"
  | "unscoped-document-block";

export interface Rejection {
  status: "rejected";
  reason: RejectReason;
  message: string;
}

export type Outcome<T> = { status: "ok"; value: T } | Rejection;

export interface BlockerEntryFactoryOptions {
  advancedBlocking?: boolean;
}

export interface WireTrigger {
  "url-filter": string;
  "url-filter-is-case-sensitive"?: boolean;
  "if-domain"?: string[];
  "unless-domain"?: string[];
  "resource-type"?: ResourceType[];
  "load-type"?: LoadType[];
}

export interface WireAction {
  type: ActionType;
  selector?: string;
  css?: string;
  script?: string;
  scriptlet?: string;
  scriptletParam?: string;
}

export interface WireEntry {
  trigger: WireTrigger;
  action: WireAction;
}

export interface ParseIssue {
  line: number;
  ruleText: string;
  message: string;
}

export interface ParsedRules {
  rules: Rule[];
  issues: ParseIssue[];
}

export interface RejectedRule {
  ruleText: string;
  reason: RejectReason;
  message: string;
}

export interface ConversionOptions {
  limit?: number;
  advancedBlocking?: boolean;
  onRejected?: "skip" | "error";
}

export interface RuleTypeCounts {
  network: number;
  "css-hide": number;
  "extended-css-hide": number;
  "script-inject": number;
  "scriptlet-inject": number;
  allowlist: number;
}

export interface ConversionStats {
  rules: RuleTypeCounts;
  actions: Record<ActionType, number>;
  rejections: Record<RejectReason, number>;
}

export interface ConversionReport {
  rejected: RejectedRule[];
  issues: ParseIssue[];
  stats: ConversionStats;
}

export interface ConversionResult {
  converted: string;
  convertedCount: number;
  totalConvertedCount: number;
  errorsCount: number;
  overLimit: boolean;
  advancedBlocking?: string;
  advancedBlockingConvertedCount: number;
  report: ConversionReport;
}
