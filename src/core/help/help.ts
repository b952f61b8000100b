// PURITY: CORE (builder mutates only its own block list)
// INVARIANT: lines() is a pure function of the blocks added so far
// COMPLEXITY: O(n) where n = total rendered characters

import type { OptionConfig } from "../models.js";
import { createOptsHelp } from "./opts-help.js";
import { spaces } from "./width.js";

/**
 * Layout of one help block.
 *
 * @remarks
 * - marginLeft: columns added before every line of the block
 * - indent: for text, columns added before continuation lines; for
 *   options, the description column (0 computes it)
 */
export interface HelpBlockOptions {
	readonly indent?: number;
	readonly marginLeft?: number;
}

type Block =
	| {
			readonly kind: "text";
			readonly text: string;
			readonly indent: number;
			readonly marginLeft: number;
	  }
	| {
			readonly kind: "opts";
			readonly cfgs: readonly OptionConfig[];
			readonly indent: number;
			readonly marginLeft: number;
	  };

const renderText = (
	text: string,
	indent: number,
	marginLeft: number,
): string[] =>
	text
		.split("\n")
		.map((line, index) =>
			line.length === 0
				? ""
				: `${spaces(marginLeft)}${index === 0 ? "" : spaces(indent)}${line}`,
		);

const renderOpts = (
	cfgs: readonly OptionConfig[],
	indent: number,
	marginLeft: number,
): string[] =>
	createOptsHelp(cfgs, indent).entries.flatMap((entry) =>
		entry.text
			.split("\n")
			.map((line, index) =>
				index === 0
					? `${spaces(marginLeft + entry.firstIndent)}${line}`
					: `${spaces(marginLeft)}${line}`,
			),
	);

/**
 * Accumulates free text and option blocks and renders them as lines.
 *
 * @example
 * ```ts
 * const help = new Help();
 * help.addText("Usage: app [options]");
 * help.addOpts(cfgs, { marginLeft: 2 });
 * help.lines(); // ["Usage: app [options]", "  --foo-bar  ..."]
 * ```
 */
export class Help {
	private readonly blocks: Block[] = [];

	addText(text: string, options: HelpBlockOptions = {}): this {
		this.blocks.push({
			kind: "text",
			text,
			indent: options.indent ?? 0,
			marginLeft: options.marginLeft ?? 0,
		});
		return this;
	}

	addOpts(cfgs: readonly OptionConfig[], options: HelpBlockOptions = {}): this {
		this.blocks.push({
			kind: "opts",
			cfgs,
			indent: options.indent ?? 0,
			marginLeft: options.marginLeft ?? 0,
		});
		return this;
	}

	lines(): string[] {
		return this.blocks.flatMap((block) =>
			block.kind === "text"
				? renderText(block.text, block.indent, block.marginLeft)
				: renderOpts(block.cfgs, block.indent, block.marginLeft),
		);
	}
}
