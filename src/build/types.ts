export type BuildTargetKind = "library" | "shared_object";

/** Condition name (or "default") to the values used when it matches. */
export type PlatformSelect = Record<string, string[]>;

export interface BuildTargetDecl {
  name: string;
  kind: BuildTargetKind;
  srcs: string[];
  hdrs?: string[];
  deps: string[];
  copts: PlatformSelect;
  features?: PlatformSelect;
  linkshared?: boolean;
}

export interface BuildTargetsDocument {
  platform_conditions: Record<string, { constraint: string }>;
  targets: BuildTargetDecl[];
}

export type ResolvedTarget = {
  name: string;
  kind: BuildTargetKind;
  /** Condition that supplied the flags, or "default". */
  condition: string;
  srcs: string[];
  hdrs: string[];
  deps: string[];
  localDeps: string[];
  copts: string[];
  features: string[];
  defines: string[];
  undefines: string[];
  includeDirs: string[];
  suppressedWarnings: string[];
};
