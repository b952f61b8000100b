// FORMAT THEOREM: ∀cfg: makeOptTitle(cfg).title contains each non-empty name once, in order
// PURITY: CORE
// INVARIANT: Empty name slots keep column alignment across aliased options
// COMPLEXITY: O(|names|)

import type { OptionConfig } from "../models.js";
import { spaces } from "./width.js";

/**
 * Option title and the blank columns that precede it.
 */
export interface OptTitle {
	readonly firstIndent: number;
	readonly title: string;
}

const prefixed = (name: string): string =>
	name.length === 1 ? `-${name}` : `--${name}`;

/**
 * Renders the title column of an option: its names with `-`/`--` prefixes,
 * then its argument display name.
 *
 * An empty name before the first real name adds 4 columns to
 * `firstIndent`; between names it widens the comma run by 4 (by 2 in last
 * position). A configuration without real names shows its storage key.
 *
 * @pure true
 * @invariant firstIndent % 4 = 0
 * @complexity O(|names|)
 *
 * @example
 * ```ts
 * makeOptTitle(makeOptionConfig({ names: ["", "f", "", "b", ""] }));
 * // { firstIndent: 4, title: "-f,     -b" }
 * makeOptTitle(makeOptionConfig({ names: ["foo-bar"], argInHelp: "<num>" }));
 * // { firstIndent: 0, title: "--foo-bar <num>" }
 * ```
 */
export function makeOptTitle(cfg: OptionConfig): OptTitle {
	let firstIndent = 0;
	let gap = 0;
	let title = "";
	let hasRealName = false;
	const last = cfg.names.length - 1;

	const append = (name: string): void => {
		if (gap > 0) {
			title += `,${spaces(gap - 1)}`;
		}
		gap = 0;
		title += prefixed(name);
	};

	for (const [index, name] of cfg.names.entries()) {
		if (name.length === 0) {
			if (title.length === 0) {
				firstIndent += 4;
			} else {
				gap += index === last ? 2 : 4;
			}
			continue;
		}
		append(name);
		hasRealName = true;
		if (index !== last) {
			gap += 2;
		}
	}

	if (!hasRealName && cfg.storeKey.length > 0) {
		append(cfg.storeKey);
	}

	if (cfg.argInHelp.length > 0) {
		title += ` ${cfg.argInHelp}`;
	}

	return { firstIndent, title };
}
