/**
 * Safety Types
 *
 * Deny-list policy and verdicts for the static safety gate.
 */

/** Operation categories a fragment may be refused for */
export type ViolationCategory =
  | 'filesystem'
  | 'process'
  | 'network'
  | 'dynamic-import'
  | 'introspection'
  | 'shell-escape';

/** Configurable deny-list */
export interface SafetyPolicy {
  /** Module specifiers that are refused, by category ("node:" prefix is ignored) */
  deniedModules: Record<string, ViolationCategory>;
  /** Modules a fragment may import or require */
  allowedModules: string[];
  /** Global identifiers that are refused when referenced */
  deniedGlobals: Record<string, ViolationCategory>;
  /** Property names that are refused in member access (introspection) */
  deniedProperties: string[];
  /** Refuse import() expressions */
  denyDynamicImport: boolean;
  /** Refuse `with` statements */
  denyWith: boolean;
  /** Shell commands recognised after a leading `!` */
  shellCommands: string[];
}

/** Why a fragment was refused */
export interface SafetyViolation {
  category: ViolationCategory;
  /** The offending construct, as written */
  construct: string;
  /** 1-based line of the construct */
  line: number;
  reason: string;
}

/** Result of a safety check */
export interface SafetyVerdict {
  allowed: boolean;
  violation?: SafetyViolation;
}
