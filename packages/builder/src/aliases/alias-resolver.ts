/**
 * Resolves user-typed system labels to dataset points.
 *
 * A label is either a canonical system name or a custom name written with
 * the `JP:` prefix. The prefix is recognised in any case so that a mistyped
 * `jp:` label fails as an unknown custom name; the custom name itself is
 * matched case-sensitively.
 */

import type { StarPoint } from "@neutron-hop/types";
import type { StarDataset } from "../dataset/dataset.js";
import { UnknownAliasError, UnknownPointError } from "../errors.js";
import type { AliasTable } from "./alias-file.js";

/** Prefix marking a label as a custom name */
export const ALIAS_PREFIX = "JP:";

/** True if the label carries the custom-name prefix, in any case */
export function isAliasLabel(label: string): boolean {
  return label.slice(0, ALIAS_PREFIX.length).toUpperCase() === ALIAS_PREFIX;
}

export class AliasResolver {
  constructor(
    private readonly dataset: StarDataset,
    private readonly aliases: AliasTable = new Map(),
  ) {}

  /**
   * Canonical name for a label, without consulting the dataset.
   *
   * @throws UnknownAliasError if a prefixed label has no alias entry
   */
  canonicalName(label: string): string {
    if (!isAliasLabel(label)) return label;
    const target = this.aliases.get(label.slice(ALIAS_PREFIX.length));
    if (target === undefined) throw new UnknownAliasError(label);
    return target;
  }

  /**
   * Resolve a label to a system.
   *
   * @throws UnknownAliasError for an unmapped custom name
   * @throws UnknownPointError if the (resolved) name is not in the dataset
   */
  resolve(label: string): StarPoint {
    const name = this.canonicalName(label);
    const point = this.dataset.pointById(name);
    if (!point) throw new UnknownPointError(name);
    return point;
  }
}
