// FORMAT THEOREM: cfg = names-spec ["=" default-spec], split at the first "="
// PURITY: CORE
// INVARIANT: defaults = undefined ⇔ cfg holds no "="
// COMPLEXITY: O(n) where n = |cfg|

/**
 * Names and default list declared by a `cfg` attribute.
 */
export interface CfgAttr {
	readonly names: readonly string[];
	readonly defaults: readonly string[] | undefined;
}

/**
 * Parses a default spec.
 *
 * - `[a,b]` → ["a", "b"]; `[]` → []
 * - `s[asb]` → ["a", "b"] with `s` as separator; `s[]` → []
 * - anything else is a single literal, so "" → [""]
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parseDefaults("[1,2]");  // ["1", "2"]
 * parseDefaults("|[a|b]"); // ["a", "b"]
 * parseDefaults("x");      // ["x"]
 * ```
 */
export function parseDefaults(spec: string): readonly string[] {
	if (!spec.endsWith("]")) {
		return [spec];
	}
	if (spec.startsWith("[")) {
		const inner = spec.slice(1, -1);
		return inner.length === 0 ? [] : inner.split(",");
	}
	const [separator, open, ...rest] = Array.from(spec.slice(0, -1));
	if (separator === undefined || open !== "[") {
		return [spec];
	}
	const inner = rest.join("");
	return inner.length === 0 ? [] : inner.split(separator);
}

/**
 * Parses a `cfg` attribute value.
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parseCfgAttr("f, foo-bar=[1,2]"); // { names: ["f", "foo-bar"], defaults: ["1", "2"] }
 * parseCfgAttr("=");                // { names: [], defaults: [""] }
 * ```
 */
export function parseCfgAttr(cfg: string | undefined): CfgAttr {
	if (cfg === undefined) {
		return { names: [], defaults: undefined };
	}
	const eq = cfg.indexOf("=");
	const namesSpec = eq < 0 ? cfg : cfg.slice(0, eq);
	const names =
		namesSpec.length === 0 ? [] : namesSpec.split(",").map((name) => name.trim());
	return {
		names,
		defaults: eq < 0 ? undefined : parseDefaults(cfg.slice(eq + 1)),
	};
}
