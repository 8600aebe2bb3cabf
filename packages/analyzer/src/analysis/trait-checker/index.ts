export { traitChecker } from "./checker.js";
export { postTypeCheckTraitChecker } from "./post-type-check.js";
export { loadTrait, type ResolvedTrait } from "./lookup.js";
