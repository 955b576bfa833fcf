/**
 * Layered JSON config for the route search.
 *
 * `configs/search/base.json` holds a full SearchConfig; named profiles in
 * `configs/search/profiles/` hold partial overrides merged on top of it.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Secondary ordering inside a hop-count layer.
 * - "distance": lower cumulative distance first
 * - "goal-distance": closer (straight line) to the destination first
 */
export type TieBreak = "distance" | "goal-distance";

export const TIE_BREAKS: readonly TieBreak[] = ["distance", "goal-distance"];

/** Retry policy for searches that find no route at the configured range */
export interface EscalationConfig {
  enabled: boolean;
  /** Light years added to the base range per retry */
  step: number;
  /** Give up once the base range would exceed this */
  maxJumpRange: number;
}

export interface SearchConfig {
  /** Jump range (ly) from a fuel star without its own range attribute */
  baseJumpRange: number;
  /** Multiplier on the base range when departing a neutron star without its own range attribute */
  neutronBoost: number;
  tieBreak: TieBreak;
  /** Upper bound on search nodes created before giving up */
  maxSearchNodes: number;
  escalation: EscalationConfig;
}

/** Partial overrides, as stored in a profile */
export type SearchConfigOverrides = Partial<Omit<SearchConfig, "escalation">> & {
  escalation?: Partial<EscalationConfig>;
};

export interface SearchProfile {
  name: string;
  description: string;
  overrides: SearchConfigOverrides;
}

export type SearchProfileInfo = Omit<SearchProfile, "overrides">;

/** Raised for config values the search cannot run with */
export class InvalidSearchConfigError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = "InvalidSearchConfigError";
  }
}

// ---------------------------------------------------------------------------
// Defaults + merge
// ---------------------------------------------------------------------------

export function getDefaultSearchConfig(): SearchConfig {
  return {
    baseJumpRange: 30,
    neutronBoost: 6,
    tieBreak: "distance",
    maxSearchNodes: 5_000_000,
    escalation: {
      enabled: false,
      step: 1,
      maxJumpRange: 1000,
    },
  };
}

/** Apply overrides on top of a full config. Nested escalation values merge per key. */
export function applySearchOverrides(
  base: SearchConfig,
  overrides: SearchConfigOverrides,
): SearchConfig {
  const { escalation, ...rest } = overrides;
  return {
    ...base,
    ...rest,
    escalation: { ...base.escalation, ...escalation },
  };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isTieBreak(value: unknown): value is TieBreak {
  return TIE_BREAKS.some((t) => t === value);
}

function readNumber(obj: Record<string, unknown>, key: string, source?: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidSearchConfigError(`"${key}" must be a finite number`, source);
  }
  return value;
}

/**
 * Read config overrides from parsed JSON, checking the type of every known
 * key. Unknown keys are ignored with a warning.
 */
export function parseSearchOverrides(raw: unknown, source?: string): SearchConfigOverrides {
  if (!isRecord(raw)) {
    throw new InvalidSearchConfigError("Search config must be a JSON object", source);
  }

  const known = new Set(["baseJumpRange", "neutronBoost", "tieBreak", "maxSearchNodes", "escalation"]);
  const unknown = Object.keys(raw).filter((k) => !known.has(k));
  if (unknown.length > 0) {
    console.warn(`[config] Ignoring unknown search config key(s): ${unknown.join(", ")}`);
  }

  const out: SearchConfigOverrides = {};
  const baseJumpRange = readNumber(raw, "baseJumpRange", source);
  if (baseJumpRange !== undefined) out.baseJumpRange = baseJumpRange;
  const neutronBoost = readNumber(raw, "neutronBoost", source);
  if (neutronBoost !== undefined) out.neutronBoost = neutronBoost;
  const maxSearchNodes = readNumber(raw, "maxSearchNodes", source);
  if (maxSearchNodes !== undefined) out.maxSearchNodes = maxSearchNodes;

  const tieBreak = raw["tieBreak"];
  if (tieBreak !== undefined) {
    if (!isTieBreak(tieBreak)) {
      throw new InvalidSearchConfigError(
        `"tieBreak" must be one of: ${TIE_BREAKS.join(", ")}`,
        source,
      );
    }
    out.tieBreak = tieBreak;
  }

  const escalation = raw["escalation"];
  if (escalation !== undefined) {
    if (!isRecord(escalation)) {
      throw new InvalidSearchConfigError(`"escalation" must be an object`, source);
    }
    const esc: Partial<EscalationConfig> = {};
    const enabled = escalation["enabled"];
    if (enabled !== undefined) {
      if (typeof enabled !== "boolean") {
        throw new InvalidSearchConfigError(`"escalation.enabled" must be a boolean`, source);
      }
      esc.enabled = enabled;
    }
    const step = readNumber(escalation, "step", source);
    if (step !== undefined) esc.step = step;
    const maxJumpRange = readNumber(escalation, "maxJumpRange", source);
    if (maxJumpRange !== undefined) esc.maxJumpRange = maxJumpRange;
    out.escalation = esc;
  }

  return out;
}

/**
 * Check that a full config is usable.
 *
 * @throws InvalidSearchConfigError naming the first bad value
 */
export function validateSearchConfig(config: SearchConfig, source?: string): SearchConfig {
  const positive: [string, number][] = [
    ["baseJumpRange", config.baseJumpRange],
    ["neutronBoost", config.neutronBoost],
    ["escalation.step", config.escalation.step],
    ["escalation.maxJumpRange", config.escalation.maxJumpRange],
  ];
  for (const [key, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidSearchConfigError(`"${key}" must be a positive number, got ${value}`, source);
    }
  }
  if (!Number.isInteger(config.maxSearchNodes) || config.maxSearchNodes < 1) {
    throw new InvalidSearchConfigError(
      `"maxSearchNodes" must be a positive integer, got ${config.maxSearchNodes}`,
      source,
    );
  }
  if (!isTieBreak(config.tieBreak)) {
    throw new InvalidSearchConfigError(`Unknown tie-break "${config.tieBreak}"`, source);
  }
  return config;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/search/`.
 * Works from both source (packages/routing/src/config/) and compiled output.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "search");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // Fallback: repo root relative to packages/routing/src/config
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "search");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Load the base config. Falls back to hardcoded defaults if the file is absent or unreadable. */
export function loadBaseSearchConfig(configsRoot: string = findConfigsRoot()): SearchConfig {
  const filePath = join(configsRoot, "base.json");

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch {
    console.warn(`[config] No readable base search config at ${filePath}, using defaults`);
    return getDefaultSearchConfig();
  }
  const merged = applySearchOverrides(getDefaultSearchConfig(), parseSearchOverrides(raw, filePath));
  return validateSearchConfig(merged, filePath);
}

function readProfile(filePath: string): SearchProfile {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  if (!isRecord(raw)) {
    throw new InvalidSearchConfigError("Profile must be a JSON object", filePath);
  }
  const { name, description, overrides } = raw;
  if (typeof name !== "string") {
    throw new InvalidSearchConfigError(`Profile is missing a "name"`, filePath);
  }
  return {
    name,
    description: typeof description === "string" ? description : "",
    overrides: parseSearchOverrides(overrides ?? {}, filePath),
  };
}

/**
 * Load a named profile merged on top of the base config.
 *
 * @throws If the profile file is missing or invalid
 */
export function loadSearchProfile(
  profileName: string,
  configsRoot: string = findConfigsRoot(),
): SearchConfig & { _profile: SearchProfileInfo } {
  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!existsSync(filePath)) {
    throw new InvalidSearchConfigError(`Unknown search profile "${profileName}"`, filePath);
  }
  const profile = readProfile(filePath);
  const merged = applySearchOverrides(loadBaseSearchConfig(configsRoot), profile.overrides);

  return {
    ...validateSearchConfig(merged, filePath),
    _profile: { name: profile.name, description: profile.description },
  };
}

/** List all available profiles from the profiles directory. */
export function listSearchProfiles(configsRoot: string = findConfigsRoot()): SearchProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const files = readdirSync(profilesDir)
    .filter((f) => f.endsWith(".json"))
    .sort();
  const profiles: SearchProfileInfo[] = [];

  for (const file of files) {
    try {
      const { name, description } = readProfile(join(profilesDir, file));
      profiles.push({ name, description });
    } catch (err) {
      console.warn(`[config] Skipping profile ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return profiles;
}
