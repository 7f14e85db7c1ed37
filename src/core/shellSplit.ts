/**
 * POSIX shell word splitting and quoting. No expansion, no operators: `a&&b` is one word.
 * A `#` that starts a word begins a comment running to the end of the line.
 */

import { ShellSplitError } from "./errors.js";

const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);
/** Characters a backslash escapes inside double quotes; any other backslash stays literal. */
const DQUOTE_ESCAPABLE = new Set(["$", "`", '"', "\\", "\n"]);
const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Split a script into words the way sh does before expansion.
 * Throws ShellSplitError on an unterminated quote or a trailing backslash.
 */
export function shellSplit(script: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let i = 0;

  while (i < script.length) {
    const ch = script.charAt(i);

    if (WHITESPACE.has(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      i++;
      continue;
    }

    if (!inWord && ch === "#") {
      const eol = script.indexOf("\n", i);
      i = eol < 0 ? script.length : eol;
      continue;
    }

    inWord = true;

    if (ch === "'") {
      const end = script.indexOf("'", i + 1);
      if (end < 0) {
        throw new ShellSplitError(`unterminated single quote at offset ${i}`, script);
      }
      current += script.slice(i + 1, end);
      i = end + 1;
      continue;
    }

    if (ch === '"') {
      i++;
      let closed = false;
      while (i < script.length) {
        const c = script.charAt(i);
        if (c === '"') {
          closed = true;
          i++;
          break;
        }
        if (c === "\\" && i + 1 < script.length) {
          const next = script.charAt(i + 1);
          if (DQUOTE_ESCAPABLE.has(next)) {
            if (next !== "\n") current += next;
            i += 2;
            continue;
          }
        }
        current += c;
        i++;
      }
      if (!closed) {
        throw new ShellSplitError("unterminated double quote", script);
      }
      continue;
    }

    if (ch === "\\") {
      if (i + 1 >= script.length) {
        throw new ShellSplitError("trailing backslash", script);
      }
      const next = script.charAt(i + 1);
      if (next === "\n") {
        // line continuation joins the two lines
        if (current === "") inWord = false;
      } else {
        current += next;
      }
      i += 2;
      continue;
    }

    current += ch;
    i++;
  }

  if (inWord) words.push(current);
  return words;
}

/** Quote a word so that shellSplit (and sh) read it back unchanged. */
export function shellQuote(word: string): string {
  if (word === "") return "''";
  if (SAFE_WORD.test(word)) return word;
  return "'" + word.replace(/'/g, `'"'"'`) + "'";
}

/** Rebuild a script from argv, quoting only the words that need it. */
export function shellJoin(words: readonly string[]): string {
  return words.map(shellQuote).join(" ");
}
