import type { RepresentationTag } from "./model";
import { ParseError, type SourceSpan } from "./errors";

export type TokenKind = "word" | "quoted" | "string" | "number" | "symbol" | "eof";

export interface Token {
	readonly kind: TokenKind;
	/** Unescaped value for strings and quoted identifiers, raw text otherwise */
	readonly value: string;
	readonly span: SourceSpan;
}

export interface LexerOptions {
	/** Quote character of string literals */
	readonly stringQuote: "'" | '"';
	/** `double` escapes the quote by doubling it (SQL), `backslash` uses JSON escapes */
	readonly stringEscape: "double" | "backslash";
	/** Quote character of delimited identifiers, if the syntax has them */
	readonly identifierQuote?: '"' | "`";
	readonly lineComment: string;
	readonly blockComments?: boolean;
	/** Multi-character symbols; any other non-space, non-word character is a one-character symbol */
	readonly symbols?: readonly string[];
}

const wordStart = /[\p{L}_]/u;
const wordPart = /[\p{L}\p{N}_$]/u;

/**
 * Splits text into tokens. Shared by the DDL, call-tree and set-notation adapters.
 */
export function tokenize(text: string, repr: RepresentationTag, options: LexerOptions): Token[] {
	const tokens: Token[] = [];
	const symbols = [...(options.symbols ?? [])].sort((a, b) => b.length - a.length);
	let pos = 0;
	let line = 1;
	let lineStart = 0;

	const spanAt = (start: number, end: number, startLine = line, startLineOffset = lineStart): SourceSpan => ({
		offset: start,
		line: startLine,
		column: start - startLineOffset + 1,
		length: end - start,
	});

	const advance = (to: number) => {
		for (let i = pos; i < to; i++) {
			if (text[i] === "\n") {
				line++;
				lineStart = i + 1;
			}
		}
		pos = to;
	};

	while (pos < text.length) {
		const ch = text[pos];

		if (/\s/.test(ch)) {
			advance(pos + 1);
			continue;
		}

		if (text.startsWith(options.lineComment, pos)) {
			const end = text.indexOf("\n", pos);
			advance(end === -1 ? text.length : end);
			continue;
		}

		if (options.blockComments && text.startsWith("/*", pos)) {
			const end = text.indexOf("*/", pos + 2);
			if (end === -1) {
				throw new ParseError(repr, "Unterminated block comment", spanAt(pos, text.length));
			}
			advance(end + 2);
			continue;
		}

		const start = pos;
		const startLine = line;
		const startLineOffset = lineStart;

		if (ch === options.stringQuote || ch === options.identifierQuote) {
			const isString = ch === options.stringQuote;
			const escape = isString ? options.stringEscape : "double";
			const [value, end] = readQuoted(text, pos, ch, escape);
			if (end === -1) {
				throw new ParseError(repr, `Unterminated ${isString ? "string" : "quoted identifier"}`, spanAt(start, text.length));
			}
			advance(end);
			tokens.push({ kind: isString ? "string" : "quoted", value, span: spanAt(start, end, startLine, startLineOffset) });
			continue;
		}

		if (/\d/.test(ch)) {
			const match = /^\d+(\.\d+)?/.exec(text.slice(pos));
			const end = pos + (match ? match[0].length : 1);
			advance(end);
			tokens.push({ kind: "number", value: text.slice(start, end), span: spanAt(start, end, startLine, startLineOffset) });
			continue;
		}

		if (wordStart.test(ch)) {
			let end = pos + 1;
			while (end < text.length && wordPart.test(text[end])) end++;
			advance(end);
			tokens.push({ kind: "word", value: text.slice(start, end), span: spanAt(start, end, startLine, startLineOffset) });
			continue;
		}

		const symbol = symbols.find(s => text.startsWith(s, pos)) ?? ch;
		advance(pos + symbol.length);
		tokens.push({ kind: "symbol", value: symbol, span: spanAt(start, pos, startLine, startLineOffset) });
	}

	tokens.push({ kind: "eof", value: "", span: spanAt(pos, pos) });
	return tokens;
}

const escapes: Record<string, string> = { n: "\n", t: "\t", r: "\r", b: "\b", f: "\f" };

function readQuoted(text: string, start: number, quote: string, escape: "double" | "backslash"): [string, number] {
	let value = "";
	let i = start + 1;
	while (i < text.length) {
		const ch = text[i];
		if (escape === "backslash" && ch === "\\") {
			const next = text[i + 1];
			if (next === undefined) return [value, -1];
			if (next === "u") {
				value += String.fromCharCode(parseInt(text.slice(i + 2, i + 6), 16));
				i += 6;
				continue;
			}
			value += escapes[next] ?? next;
			i += 2;
			continue;
		}
		if (ch === quote) {
			if (escape === "double" && text[i + 1] === quote) {
				value += quote;
				i += 2;
				continue;
			}
			return [value, i + 1];
		}
		value += ch;
		i++;
	}
	return [value, -1];
}

/**
 * Cursor over a token list with the lookahead helpers the recursive-descent parsers need.
 */
export class TokenStream {
	private _index = 0;

	constructor(
		private readonly _tokens: readonly Token[],
		readonly representation: RepresentationTag,
		private readonly _text: string
	) { }

	peek(offset = 0): Token {
		return this._tokens[Math.min(this._index + offset, this._tokens.length - 1)];
	}

	next(): Token {
		const token = this.peek();
		if (token.kind !== "eof") this._index++;
		return token;
	}

	get atEnd(): boolean {
		return this.peek().kind === "eof";
	}

	/** Case-insensitive keyword test. */
	isWord(keyword: string, offset = 0): boolean {
		const token = this.peek(offset);
		return token.kind === "word" && token.value.toUpperCase() === keyword.toUpperCase();
	}

	isSymbol(symbol: string, offset = 0): boolean {
		const token = this.peek(offset);
		return token.kind === "symbol" && token.value === symbol;
	}

	acceptWord(...keywords: string[]): boolean {
		if (!keywords.every((k, i) => this.isWord(k, i))) return false;
		for (let i = 0; i < keywords.length; i++) this.next();
		return true;
	}

	acceptSymbol(symbol: string): boolean {
		if (!this.isSymbol(symbol)) return false;
		this.next();
		return true;
	}

	expectWord(...keywords: string[]): void {
		if (!this.acceptWord(...keywords)) {
			throw this.error(`Expected ${keywords.join(" ")}`);
		}
	}

	expectSymbol(symbol: string): Token {
		const token = this.peek();
		if (!this.acceptSymbol(symbol)) {
			throw this.error(`Expected "${symbol}"`);
		}
		return token;
	}

	expectString(): string {
		const token = this.peek();
		if (token.kind !== "string") {
			throw this.error("Expected a string literal");
		}
		this.next();
		return token.value;
	}

	/** Plain or quoted identifier. */
	expectIdentifier(what = "identifier"): string {
		const token = this.peek();
		if (token.kind !== "word" && token.kind !== "quoted") {
			throw this.error(`Expected ${what}`);
		}
		this.next();
		return token.value;
	}

	/** Source text from the start of `from` up to (not including) the current token. */
	textSince(from: Token): string {
		const end = this.peek().span.offset;
		return this._text.slice(from.span.offset, Math.max(end, from.span.offset + from.span.length)).trim();
	}

	error(detail: string, token: Token = this.peek()): ParseError {
		const found = token.kind === "eof" ? "end of input" : `"${token.value}"`;
		return new ParseError(this.representation, `${detail}, found ${found}`, token.span);
	}
}
