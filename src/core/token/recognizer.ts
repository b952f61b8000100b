// FORMAT THEOREM: ∀a ∈ Arg: recognize(a) ∈ {EndOfOptions, Long, InvalidLong, ShortCluster, Positional}
// PURITY: CORE
// INVARIANT: Classification depends only on the text of one argument
// COMPLEXITY: O(n) where n = |arg|

/**
 * A short name (or an invalid character) met while scanning a cluster.
 */
export type ClusterEvent =
	| { readonly kind: "flag"; readonly name: string }
	| { readonly kind: "invalid"; readonly char: string };

/**
 * Last valid short name of a cluster together with its inline value.
 */
export interface ClusterTerminal {
	readonly name: string;
	readonly value: string | undefined;
}

/**
 * Classified argument.
 *
 * @remarks
 * - `long.value` is present only when an `=` was consumed
 * - `shortCluster.events` lists valueless flags and invalid characters in
 *   scan order; `terminal` is the name that may receive a value
 */
export type Token =
	| { readonly kind: "endOfOptions" }
	| {
			readonly kind: "long";
			readonly name: string;
			readonly value: string | undefined;
	  }
	| { readonly kind: "invalidLong"; readonly option: string }
	| {
			readonly kind: "shortCluster";
			readonly events: readonly ClusterEvent[];
			readonly terminal: ClusterTerminal | undefined;
	  }
	| { readonly kind: "positional"; readonly bareDash: boolean };

const isAsciiLetter = (ch: string): boolean => /^[A-Za-z]$/u.test(ch);

const isLongNameChar = (ch: string): boolean => /^[A-Za-z0-9-]$/u.test(ch);

/**
 * Checks whether text is a valid long option name.
 *
 * @pure true
 * @invariant isValidLongName(s) ⇔ s ∈ [A-Za-z][A-Za-z0-9-]*
 */
export const isValidLongName = (name: string): boolean =>
	/^[A-Za-z][A-Za-z0-9-]*$/u.test(name);

/**
 * Checks whether text is a valid short option name.
 *
 * @pure true
 */
export const isValidShortName = (name: string): boolean =>
	isAsciiLetter(name);

/**
 * Splits the text after `--` into name and inline value.
 *
 * The first character must be a letter; later characters are letters,
 * digits or `-` until an `=`. An invalid option is reported with the whole
 * text after `--`, inline value included.
 *
 * @pure true
 * @complexity O(n)
 */
function recognizeLong(body: string): Token {
	const eq = body.indexOf("=");
	if (eq === 0) {
		return { kind: "invalidLong", option: body };
	}

	const name = eq < 0 ? body : body.slice(0, eq);
	for (const [index, ch] of Array.from(name).entries()) {
		const valid = index === 0 ? isAsciiLetter(ch) : isLongNameChar(ch);
		if (!valid) {
			return { kind: "invalidLong", option: body };
		}
	}
	return {
		kind: "long",
		name,
		value: eq < 0 ? undefined : body.slice(eq + 1),
	};
}

/**
 * Scans the text after `-` left to right.
 *
 * Each letter becomes the current candidate; a following character flushes
 * the candidate as a valueless flag. A non-letter is reported on its own
 * and clears the candidate. An `=` after the first position hands the rest
 * of the text to the current candidate and ends the scan.
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * recognizeCluster("abc=V");
 * // events: [flag a, flag b], terminal: { name: "c", value: "V" }
 * recognizeCluster("=x");
 * // events: [invalid "="], terminal: { name: "x", value: undefined }
 * ```
 */
function recognizeCluster(body: string): Token {
	const events: ClusterEvent[] = [];
	const chars = Array.from(body);
	let candidate = "";
	let offset = 0;

	for (const [index, ch] of chars.entries()) {
		if (index > 0) {
			if (ch === "=") {
				const value = body.slice(offset + 1);
				return {
					kind: "shortCluster",
					events,
					terminal:
						candidate.length > 0 ? { name: candidate, value } : undefined,
				};
			}
			if (candidate.length > 0) {
				events.push({ kind: "flag", name: candidate });
			}
		}
		if (isAsciiLetter(ch)) {
			candidate = ch;
		} else {
			events.push({ kind: "invalid", char: ch });
			candidate = "";
		}
		offset += ch.length;
	}

	return {
		kind: "shortCluster",
		events,
		terminal:
			candidate.length > 0 ? { name: candidate, value: undefined } : undefined,
	};
}

/**
 * Classifies one command-line argument.
 *
 * @pure true
 * @invariant recognize("--") = EndOfOptions ∧ recognize("-") = Positional
 * @complexity O(n) where n = |arg|
 *
 * @example
 * ```ts
 * recognize("--foo-bar=123"); // { kind: "long", name: "foo-bar", value: "123" }
 * recognize("-");             // { kind: "positional", bareDash: true }
 * recognize("--");            // { kind: "endOfOptions" }
 * ```
 */
export function recognize(arg: string): Token {
	if (arg === "--") {
		return { kind: "endOfOptions" };
	}
	if (arg.startsWith("--")) {
		return recognizeLong(arg.slice(2));
	}
	if (arg === "-") {
		return { kind: "positional", bareDash: true };
	}
	if (arg.startsWith("-")) {
		return recognizeCluster(arg.slice(1));
	}
	return { kind: "positional", bareDash: false };
}
