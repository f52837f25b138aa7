// src/ast/template.ts

import {RenderError, RuleError} from '../core/errors';
import {DEFAULT_SYNTAX, type TemplateSyntax} from '../schema';
import {parseExpression, type Expr} from './expression';

export interface TextNode {
    type: 'text';
    value: string;
    offset: number;
}

export interface PlaceholderNode {
    type: 'placeholder';
    /** Trimmed inner text, e.g. "project-name | snake_case". */
    token: string;
    name: string;
    filters: string[];
    offset: number;
}

export interface IfBranch {
    condition: Expr;
    /** Condition source text as written in the tag. */
    source: string;
    /** Offset of the condition source within the file. */
    offset: number;
    body: TemplateAstNode[];
}

/**
 * `if` / `elif` / `else` / `endif`. Exactly one branch (or none) is kept
 * at render time.
 */
export interface IfNode {
    type: 'if';
    branches: IfBranch[];
    elseBody: TemplateAstNode[] | null;
    offset: number;
}

export type TemplateAstNode = TextNode | PlaceholderNode | IfNode;

export interface ParseTemplateOptions {
    syntax?: Partial<TemplateSyntax>;
    /**
     * Template-relative path used in error messages.
     */
    file?: string;
}

/**
 * Parse template text into an AST.
 *
 * Whitespace control is applied while lexing, so it does not depend on
 * which branch is kept:
 *   "{%-" / "{{-" strip all whitespace before the tag,
 *   "-%}" / "-}}" strip all whitespace after it.
 *
 * Throws RenderError for structural problems (unterminated tags/blocks,
 * stray branch tags) and RuleError for malformed conditions.
 */
export function parseTemplate(
    text: string,
    opts: ParseTemplateOptions = {},
): TemplateAstNode[] {
    const syntax: TemplateSyntax = {...DEFAULT_SYNTAX, ...opts.syntax};
    const file = opts.file ?? '<inline>';
    const tokens = lex(text, syntax, file);
    return new TemplateParser(tokens, text, file).parseDocument();
}

/**
 * Every placeholder in the AST, including those in branches that may
 * never be kept.
 */
export function collectPlaceholders(nodes: TemplateAstNode[]): PlaceholderNode[] {
    const out: PlaceholderNode[] = [];
    walkNodes(nodes, (node) => {
        if (node.type === 'placeholder') out.push(node);
    });
    return out;
}

/**
 * Every branch condition in the AST.
 */
export function collectConditions(nodes: TemplateAstNode[]): IfBranch[] {
    const out: IfBranch[] = [];
    walkNodes(nodes, (node) => {
        if (node.type === 'if') out.push(...node.branches);
    });
    return out;
}

function walkNodes(
    nodes: TemplateAstNode[],
    visit: (node: TemplateAstNode) => void,
): void {
    for (const node of nodes) {
        visit(node);
        if (node.type === 'if') {
            for (const branch of node.branches) walkNodes(branch.body, visit);
            if (node.elseBody) walkNodes(node.elseBody, visit);
        }
    }
}

// ---------------------------------------------------------------------------
// Internal: lexer
// ---------------------------------------------------------------------------

type LexToken =
    | {kind: 'text'; value: string; offset: number; raw?: boolean}
    | {kind: 'placeholder'; inner: string; offset: number; innerOffset: number}
    | {kind: 'tag'; inner: string; offset: number; innerOffset: number};

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function lex(text: string, syntax: TemplateSyntax, file: string): LexToken[] {
    const tokens: LexToken[] = [];
    const len = text.length;
    let pos = 0;
    let trimNext = false;

    const pushText = (value: string, offset: number): void => {
        const v = trimNext ? value.replace(/^\s+/, '') : value;
        trimNext = false;
        if (v) tokens.push({kind: 'text', value: v, offset});
    };

    const trimPrevious = (): void => {
        const last = tokens[tokens.length - 1];
        // Whitespace control never reaches into raw content.
        if (!last || last.kind !== 'text' || last.raw) return;
        last.value = last.value.replace(/\s+$/, '');
        if (!last.value) tokens.pop();
    };

    const endRaw = new RegExp(
        `${escapeRegExp(syntax.blockStart)}(-?)\\s*endraw\\s*(-?)${escapeRegExp(syntax.blockEnd)}`,
        'g',
    );

    while (pos < len) {
        const p = text.indexOf(syntax.placeholderStart, pos);
        const b = text.indexOf(syntax.blockStart, pos);

        if (p === -1 && b === -1) {
            pushText(text.slice(pos), pos);
            break;
        }

        let isBlock: boolean;
        if (p === -1) isBlock = true;
        else if (b === -1) isBlock = false;
        else if (p === b) isBlock = syntax.blockStart.length >= syntax.placeholderStart.length;
        else isBlock = b < p;

        const start = isBlock ? b : p;
        const open = isBlock ? syntax.blockStart : syntax.placeholderStart;
        const close = isBlock ? syntax.blockEnd : syntax.placeholderEnd;

        pushText(text.slice(pos, start), pos);

        let innerStart = start + open.length;
        if (text[innerStart] === '-') {
            trimPrevious();
            innerStart += 1;
        }

        const end = text.indexOf(close, innerStart);
        if (end === -1) {
            throw new RenderError({
                code: 'UnterminatedTag',
                detail: `"${open}" has no matching "${close}"`,
                file,
                text,
                offset: start,
            });
        }

        let innerEnd = end;
        let trimAfter = false;
        if (innerEnd > innerStart && text[innerEnd - 1] === '-') {
            trimAfter = true;
            innerEnd -= 1;
        }

        const inner = text.slice(innerStart, innerEnd);
        pos = end + close.length;

        if (isBlock && inner.trim() === 'raw') {
            endRaw.lastIndex = pos;
            const m = endRaw.exec(text);
            if (!m) {
                throw new RenderError({
                    code: 'UnterminatedBlock',
                    detail: '"raw" block has no matching "endraw"',
                    file,
                    text,
                    offset: start,
                    token: 'raw',
                });
            }
            let content = text.slice(pos, m.index);
            if (trimAfter) content = content.replace(/^\s+/, '');
            if (m[1] === '-') content = content.replace(/\s+$/, '');
            if (content) tokens.push({kind: 'text', value: content, offset: pos, raw: true});
            trimNext = m[2] === '-';
            pos = m.index + m[0].length;
            continue;
        }

        tokens.push({
            kind: isBlock ? 'tag' : 'placeholder',
            inner,
            offset: start,
            innerOffset: innerStart,
        });
        trimNext = trimAfter;
    }

    return tokens;
}

// ---------------------------------------------------------------------------
// Internal: parser
// ---------------------------------------------------------------------------

type TagToken = Extract<LexToken, {kind: 'tag'}>;

type TagKeyword = 'if' | 'elif' | 'else' | 'endif';

interface ClassifiedTag {
    keyword: TagKeyword;
    argument: string;
    /** Offset of `argument` within the file. */
    argumentOffset: number;
    token: TagToken;
}

class TemplateParser {
    private pos = 0;

    constructor(
        private readonly tokens: LexToken[],
        private readonly text: string,
        private readonly file: string,
    ) {}

    parseDocument(): TemplateAstNode[] {
        return this.parseBody(false).nodes;
    }

    private parseBody(insideIf: boolean): {
        nodes: TemplateAstNode[];
        terminator: ClassifiedTag | null;
    } {
        const nodes: TemplateAstNode[] = [];

        while (this.pos < this.tokens.length) {
            const tok = this.tokens[this.pos];
            this.pos += 1;

            if (tok.kind === 'text') {
                nodes.push({type: 'text', value: tok.value, offset: tok.offset});
                continue;
            }

            if (tok.kind === 'placeholder') {
                nodes.push(this.toPlaceholder(tok.inner, tok.offset));
                continue;
            }

            const tag = this.classify(tok);
            if (tag.keyword === 'if') {
                nodes.push(this.parseIf(tag));
                continue;
            }

            if (!insideIf) {
                throw this.unexpected(tag);
            }
            return {nodes, terminator: tag};
        }

        return {nodes, terminator: null};
    }

    private parseIf(open: ClassifiedTag): IfNode {
        const branches: IfBranch[] = [];
        let elseBody: TemplateAstNode[] | null = null;
        let current: ClassifiedTag = open;

        for (;;) {
            const {nodes, terminator} = this.parseBody(true);

            if (current.keyword === 'else') {
                elseBody = nodes;
            } else {
                branches.push({
                    condition: this.parseCondition(current),
                    source: current.argument,
                    offset: current.argumentOffset,
                    body: nodes,
                });
            }

            if (!terminator) {
                throw new RenderError({
                    code: 'UnterminatedBlock',
                    detail: `"if ${open.argument}" has no matching "endif"`,
                    file: this.file,
                    text: this.text,
                    offset: open.token.offset,
                    token: open.token.inner.trim(),
                });
            }

            if (terminator.keyword === 'endif') {
                if (terminator.argument) throw this.unexpected(terminator);
                break;
            }

            if (current.keyword === 'else') {
                // Nothing may follow an else branch except endif.
                throw this.unexpected(terminator);
            }

            if (terminator.keyword === 'else' && terminator.argument) {
                throw this.unexpected(terminator);
            }

            current = terminator;
        }

        return {type: 'if', branches, elseBody, offset: open.token.offset};
    }

    private parseCondition(tag: ClassifiedTag): Expr {
        try {
            return parseExpression(tag.argument);
        } catch (err) {
            if (err instanceof RuleError) {
                throw err.relocate({file: this.file}, tag.argumentOffset);
            }
            throw err;
        }
    }

    private classify(tok: TagToken): ClassifiedTag {
        const m = /^(\s*)(\S+)(\s*)([\s\S]*?)\s*$/.exec(tok.inner);
        if (!m) {
            throw new RenderError({
                code: 'UnexpectedTag',
                detail: 'Empty block tag',
                file: this.file,
                text: this.text,
                offset: tok.offset,
                token: '',
            });
        }

        const [, lead, word, gap, rest] = m;
        const argumentOffset = tok.innerOffset + lead.length + word.length + gap.length;

        if (word === 'else') {
            const elseIf = /^if(\s+|$)/.exec(rest);
            if (elseIf) {
                return {
                    keyword: 'elif',
                    argument: rest.slice(elseIf[0].length),
                    argumentOffset: argumentOffset + elseIf[0].length,
                    token: tok,
                };
            }
            return {keyword: 'else', argument: rest, argumentOffset, token: tok};
        }

        if (word === 'if' || word === 'endif') {
            return {keyword: word, argument: rest, argumentOffset, token: tok};
        }

        if (word === 'elif' || word === 'elsif') {
            return {keyword: 'elif', argument: rest, argumentOffset, token: tok};
        }

        throw new RenderError({
            code: 'UnexpectedTag',
            detail: `Unknown tag "${word}"`,
            file: this.file,
            text: this.text,
            offset: tok.offset,
            token: word,
        });
    }

    private unexpected(tag: ClassifiedTag): RenderError {
        const written = tag.token.inner.trim();
        return new RenderError({
            code: 'UnexpectedTag',
            detail: `Unexpected "${written}"`,
            file: this.file,
            text: this.text,
            offset: tag.token.offset,
            token: written,
        });
    }

    private toPlaceholder(inner: string, offset: number): PlaceholderNode {
        const token = inner.trim();
        const [name, ...filters] = token.split('|').map((s) => s.trim());
        return {type: 'placeholder', token, name, filters, offset};
    }
}
