/**
 * Plot a neutron/fuel route between two systems and write the fuel stops.
 *
 * Usage: npx tsx scripts/plot-route.ts <start> <destination> [options]
 *
 * Options:
 *   --snapshot <path>   Star snapshot (default: $NEUTRON_HOP_SNAPSHOT or data/stars.bin)
 *   --aliases <path>    Custom-name file, created if missing (default: $NEUTRON_HOP_ALIASES or jumppoints.json)
 *   --out <path>        Route file (default: route.txt)
 *   --range <ly>        Base jump range, overriding the config
 *   --profile <name>    Search profile from configs/search/profiles
 *
 * Either system may be given as a custom name with the JP: prefix, e.g. JP:Home.
 * Exits 0 with an empty route file when no route exists, 1 on any other failure.
 */

import { plotMain } from "../src/plot/plot-command.js";

async function main() {
  process.exitCode = plotMain(process.argv.slice(2), process.env);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
