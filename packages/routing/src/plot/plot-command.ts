/**
 * The run-once plot command behind `scripts/plot-route.ts`.
 *
 * Every fallible step (config, snapshot, aliases, endpoint resolution,
 * search) runs before the route file is touched, so a fatal error leaves
 * any earlier output as it was. A run that finds no route still completes:
 * it writes an empty route file and exits 0.
 */

import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

import type { HopRecord, Route, RouteSummary } from "@neutron-hop/types";
import { AliasResolver, StarSpatialIndex, loadAliasFile, loadSnapshotFile } from "@neutron-hop/builder";

import {
  applySearchOverrides,
  loadBaseSearchConfig,
  loadSearchProfile,
  validateSearchConfig,
  type SearchConfig,
} from "../config/search-config.js";
import { NoRouteFoundError } from "../search/errors.js";
import { searchWithRangeEscalation, type EscalatedSearchResult } from "../search/escalation.js";
import { formatRoute, summarizeRoute } from "../export/route-format.js";
import { formatRouteReport, writeRouteFile } from "../export/route-text.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_SNAPSHOT_PATH = resolve(__dirname, "../../../../data/stars.bin");
export const DEFAULT_ALIAS_PATH = "jumppoints.json";
export const DEFAULT_OUTPUT_PATH = "route.txt";

export const PLOT_USAGE =
  "Usage: plot-route <start> <destination> [--snapshot p] [--aliases p] [--out p] [--range ly] [--profile name]";

const VALUE_FLAGS = ["--snapshot", "--aliases", "--out", "--range", "--profile"];

export interface PlotOptions {
  startLabel: string;
  endLabel: string;
  snapshotPath: string;
  aliasPath: string;
  outputPath: string;
  /** Base jump range override (ly) */
  range?: number;
  /** Search profile from configs/search/profiles */
  profile?: string;
}

export type PlotOutcome =
  | {
      status: "found";
      route: Route;
      records: HopRecord[];
      summary: RouteSummary;
      report: string;
      baseJumpRange: number;
    }
  | { status: "no-route"; error: NoRouteFoundError };

/** The command line could not be understood */
export class PlotArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlotArgumentError";
  }
}

/**
 * Read plot options from argv (without the node and script entries).
 * `NEUTRON_HOP_SNAPSHOT` and `NEUTRON_HOP_ALIASES` fill in paths the flags leave out.
 *
 * @throws PlotArgumentError on a flag without a value or a wrong number of systems
 */
export function parsePlotArgs(
  args: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): PlotOptions {
  const flags = new Map<string, string>();
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.includes(arg)) {
      const value = args[++i];
      if (value === undefined) throw new PlotArgumentError(`${arg} needs a value`);
      flags.set(arg, value);
    } else {
      positional.push(arg);
    }
  }
  if (positional.length !== 2) throw new PlotArgumentError(PLOT_USAGE);

  const range = flags.get("--range");
  const profile = flags.get("--profile");
  return {
    startLabel: positional[0],
    endLabel: positional[1],
    snapshotPath: flags.get("--snapshot") ?? env["NEUTRON_HOP_SNAPSHOT"] ?? DEFAULT_SNAPSHOT_PATH,
    aliasPath: flags.get("--aliases") ?? env["NEUTRON_HOP_ALIASES"] ?? DEFAULT_ALIAS_PATH,
    outputPath: flags.get("--out") ?? DEFAULT_OUTPUT_PATH,
    ...(range !== undefined ? { range: Number(range) } : {}),
    ...(profile !== undefined ? { profile } : {}),
  };
}

function buildConfig(options: PlotOptions): SearchConfig {
  let config: SearchConfig = options.profile ? loadSearchProfile(options.profile) : loadBaseSearchConfig();
  if (options.profile) console.log(`[config] Using search profile "${options.profile}"`);

  if (options.range !== undefined) {
    config = validateSearchConfig(applySearchOverrides(config, { baseJumpRange: options.range }), "--range");
  }
  return config;
}

/**
 * Load, resolve, search and write the route file.
 *
 * @throws every error except NoRouteFoundError, before writing anything
 */
export function runPlot(options: PlotOptions): PlotOutcome {
  const config = buildConfig(options);
  const dataset = loadSnapshotFile(options.snapshotPath);
  const resolver = new AliasResolver(dataset, loadAliasFile(options.aliasPath, { createIfMissing: true }));
  const start = resolver.resolve(options.startLabel);
  const end = resolver.resolve(options.endLabel);

  const index = StarSpatialIndex.build(dataset);
  let result: EscalatedSearchResult;
  try {
    result = searchWithRangeEscalation(dataset, index, start, end, config);
  } catch (err) {
    if (!(err instanceof NoRouteFoundError)) throw err;
    writeRouteFile(options.outputPath, []);
    return { status: "no-route", error: err };
  }
  if (result.escalations > 0) {
    console.log(`[search] Route needed a base range of ${result.baseJumpRange.toFixed(2)}ly`);
  }

  const records = formatRoute(result.route);
  const summary = summarizeRoute(result.route, { ...config, baseJumpRange: result.baseJumpRange });
  writeRouteFile(options.outputPath, records);
  return {
    status: "found",
    route: result.route,
    records,
    summary,
    report: formatRouteReport(result.route, summary),
    baseJumpRange: result.baseJumpRange,
  };
}

/**
 * Run the plot command and map its outcome to a process exit code:
 * 0 for a route or for no route, 1 for anything fatal.
 */
export function plotMain(
  args: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): number {
  try {
    const outcome = runPlot(parsePlotArgs(args, env));
    if (outcome.status === "no-route") {
      console.log(`[search] ${outcome.error.message}. Wrote an empty route file.`);
      return 0;
    }
    process.stdout.write(outcome.report);
    return 0;
  } catch (err) {
    console.error(`[error] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
