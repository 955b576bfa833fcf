export {
  loadAliasFile,
  parseAliasDocument,
  DEFAULT_ALIASES,
  type AliasTable,
  type AliasFileOptions,
} from "./alias-file.js";
export { AliasResolver, ALIAS_PREFIX, isAliasLabel } from "./alias-resolver.js";
