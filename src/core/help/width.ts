// PURITY: CORE
// INVARIANT: Width is counted in terminal cells, not code units
// COMPLEXITY: O(n)

import stringWidth from "string-width";

/**
 * Display width of text in terminal columns.
 *
 * @pure true
 * @invariant textWidth("") = 0
 *
 * @example
 * ```ts
 * textWidth("abc");  // 3
 * textWidth("日本"); // 4
 * ```
 */
export const textWidth = (text: string): number => stringWidth(text);

/**
 * `count` spaces; non-positive counts give "".
 *
 * @pure true
 */
export const spaces = (count: number): string => " ".repeat(Math.max(0, count));
