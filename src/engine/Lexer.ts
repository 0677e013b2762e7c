import { KEYWORDS } from "./Constants";
import { LexError } from "./Errors";

export type TokenKind = 'KEYWORD' | 'IDENTIFIER' | 'INT_LITERAL' | 'STRING_LITERAL' | 'PUNCTUATION';

export interface Token {
    kind: TokenKind;
    value: string;
    position: number;
}

const SINGLE_PUNCTUATION = new Set([',', '(', ')', ';', '*', '.', '=', '<', '>']);
const DOUBLE_PUNCTUATION = new Set(['<=', '>=', '!=', '<>']);

const isDigit = (ch: string) => ch >= '0' && ch <= '9';
const isIdentStart = (ch: string) => /[A-Za-z_]/.test(ch);
const isIdentPart = (ch: string) => /[A-Za-z0-9_]/.test(ch);
const isSpace = (ch: string) => /\s/.test(ch);

/**
 * Splits statement text into tokens in a single left-to-right pass.
 * Keywords come back upper-cased; identifiers keep their case.
 */
export function tokenize(text: string): Token[] {
    const tokens: Token[] = [];
    let pos = 0;

    while (pos < text.length) {
        const ch = text.charAt(pos);

        if (isSpace(ch)) {
            pos++;
            continue;
        }

        if (ch === "'") {
            const close = text.indexOf("'", pos + 1);
            if (close === -1) {
                throw new LexError('UNTERMINATED_STRING', pos, `Unterminated string literal at position ${pos}`);
            }
            tokens.push({ kind: 'STRING_LITERAL', value: text.slice(pos + 1, close), position: pos });
            pos = close + 1;
            continue;
        }

        if (isDigit(ch)) {
            let end = pos;
            while (end < text.length && isDigit(text.charAt(end))) end++;
            tokens.push({ kind: 'INT_LITERAL', value: text.slice(pos, end), position: pos });
            pos = end;
            continue;
        }

        if (isIdentStart(ch)) {
            let end = pos;
            while (end < text.length && isIdentPart(text.charAt(end))) end++;
            const word = text.slice(pos, end);
            const upper = word.toUpperCase();
            if (KEYWORDS.has(upper)) {
                tokens.push({ kind: 'KEYWORD', value: upper, position: pos });
            } else {
                tokens.push({ kind: 'IDENTIFIER', value: word, position: pos });
            }
            pos = end;
            continue;
        }

        const pair = text.slice(pos, pos + 2);
        if (DOUBLE_PUNCTUATION.has(pair)) {
            tokens.push({ kind: 'PUNCTUATION', value: pair === '<>' ? '!=' : pair, position: pos });
            pos += 2;
            continue;
        }

        if (SINGLE_PUNCTUATION.has(ch)) {
            tokens.push({ kind: 'PUNCTUATION', value: ch, position: pos });
            pos++;
            continue;
        }

        throw new LexError('UNEXPECTED_CHAR', pos, `Unexpected character '${ch}' at position ${pos}`);
    }

    return tokens;
}
