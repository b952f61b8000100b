// FORMAT THEOREM: ∀cfgs, indent>0: ∀e ∈ entries: desc(e) starts at column indent
// PURITY: CORE
// INVARIANT: Ignored and wildcard configurations produce no entry
// COMPLEXITY: O(n) where n = Σ|title|

import type { OptionConfig } from "../models.js";
import { isIgnored, isWildcard } from "../schema/option-config.js";
import { makeOptTitle } from "./title.js";
import { spaces, textWidth } from "./width.js";

/**
 * One rendered option. `text` excludes the `firstIndent` leading columns;
 * a wrapped description follows a newline and `indent` spaces.
 */
export interface OptHelpEntry {
	readonly firstIndent: number;
	readonly text: string;
}

export interface OptsHelp {
	readonly indent: number;
	readonly entries: readonly OptHelpEntry[];
}

interface Measured {
	readonly firstIndent: number;
	readonly title: string;
	readonly width: number;
	readonly desc: string;
}

const measure = (cfgs: readonly OptionConfig[]): readonly Measured[] =>
	cfgs
		.filter((cfg) => !isIgnored(cfg) && !isWildcard(cfg))
		.map((cfg) => {
			const { firstIndent, title } = makeOptTitle(cfg);
			return {
				firstIndent,
				title,
				width: firstIndent + textWidth(title),
				desc: cfg.desc,
			};
		});

const render = (item: Measured, indent: number): OptHelpEntry => {
	if (item.desc.length === 0) {
		return { firstIndent: item.firstIndent, text: item.title };
	}
	const text =
		item.width + 2 > indent
			? `${item.title}\n${spaces(indent)}${item.desc}`
			: `${item.title}${spaces(indent - item.width)}${item.desc}`;
	return { firstIndent: item.firstIndent, text };
};

/**
 * Lays out option help in two columns.
 *
 * With `indent = 0` the description column is the widest title plus 2 and
 * is returned as `indent`. With a positive indent, a title that leaves less
 * than 2 columns before it pushes its description to the next line.
 *
 * @pure true
 * @invariant indent_in > 0 ⇒ result.indent = indent_in
 * @complexity O(n)
 *
 * @example
 * ```ts
 * createOptsHelp([makeOptionConfig({ names: ["f"], argInHelp: "<n>", desc: "Frames." })], 0);
 * // { indent: 8, entries: [{ firstIndent: 0, text: "-f <n>  Frames." }] }
 * ```
 */
export function createOptsHelp(
	cfgs: readonly OptionConfig[],
	indent: number,
): OptsHelp {
	const measured = measure(cfgs);
	const column =
		indent > 0
			? indent
			: measured.reduce((widest, item) => Math.max(widest, item.width), 0) + 2;
	return {
		indent: column,
		entries: measured.map((item) => render(item, column)),
	};
}
