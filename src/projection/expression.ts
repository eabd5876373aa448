import { z } from 'zod';
import type { ComparisonOperator, ProjectionExpression, WhereCondition } from '../canon/entitySpec.js';

export class QuerySyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QuerySyntaxError';
  }
}

type SymbolText = ',' | '*' | ';' | '=' | '!=' | '<>' | '<' | '<=' | '>' | '>=';

type Token =
  | { type: 'word'; text: string; upper: string; offset: number }
  | { type: 'quoted'; text: string; offset: number }
  | { type: 'string'; text: string; offset: number }
  | { type: 'number'; value: number; text: string; offset: number }
  | { type: 'symbol'; text: SymbolText; offset: number };

const KEYWORDS = new Set([
  'SELECT',
  'DISTINCT',
  'FROM',
  'WHERE',
  'AND',
  'ORDER',
  'BY',
  'ASC',
  'DESC',
  'LIMIT',
  'AS',
  'IS',
  'NOT',
  'NULL',
  'TRUE',
  'FALSE'
]);

const SYMBOL_OPERATORS: Partial<Record<SymbolText, ComparisonOperator>> = {
  '=': 'eq',
  '!=': 'neq',
  '<>': 'neq',
  '<': 'lt',
  '<=': 'lte',
  '>': 'gt',
  '>=': 'gte'
};

const WORD = /[A-Za-z_][A-Za-z0-9_]*/y;
const NUMBER = /-?(\d+(\.\d+)?|\.\d+)([eE][+-]?\d+)?/y;
const SYMBOL = /<=|>=|<>|!=|[,*;=<>]/y;

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  while (offset < text.length) {
    const char = text[offset] ?? '';
    if (/\s/.test(char)) {
      offset += 1;
      continue;
    }

    if (char === "'" || char === '"') {
      const { value, end } = readQuoted(text, offset, char);
      tokens.push(char === "'" ? { type: 'string', text: value, offset } : { type: 'quoted', text: value, offset });
      offset = end;
      continue;
    }

    WORD.lastIndex = offset;
    const word = WORD.exec(text);
    if (word) {
      tokens.push({ type: 'word', text: word[0], upper: word[0].toUpperCase(), offset });
      offset += word[0].length;
      continue;
    }

    NUMBER.lastIndex = offset;
    const number = NUMBER.exec(text);
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]), text: number[0], offset });
      offset += number[0].length;
      continue;
    }

    SYMBOL.lastIndex = offset;
    const symbol = SYMBOL.exec(text);
    if (symbol && isSymbolText(symbol[0])) {
      tokens.push({ type: 'symbol', text: symbol[0], offset });
      offset += symbol[0].length;
      continue;
    }

    throw new QuerySyntaxError(`Unexpected character '${char}' at position ${offset + 1}.`);
  }

  return tokens;
}

function readQuoted(text: string, start: number, quote: string): { value: string; end: number } {
  let value = '';
  let offset = start + 1;
  while (offset < text.length) {
    const char = text[offset];
    if (char === quote) {
      if (text[offset + 1] === quote) {
        value += quote;
        offset += 2;
        continue;
      }
      return { value, end: offset + 1 };
    }
    value += char;
    offset += 1;
  }
  throw new QuerySyntaxError(`Unterminated quoted text starting at position ${start + 1}.`);
}

function isSymbolText(value: string): value is SymbolText {
  return [',', '*', ';', '=', '!=', '<>', '<', '<=', '>', '>='].includes(value);
}

class QueryParser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ProjectionExpression {
    this.expectKeyword('SELECT');
    const distinct = this.acceptKeyword('DISTINCT');

    let columns: '*' | string[];
    const rename: Array<readonly [string, string]> = [];
    if (this.acceptSymbol('*')) {
      columns = '*';
    } else {
      columns = [];
      do {
        const column = this.identifier('column name');
        columns.push(column);
        if (this.acceptKeyword('AS')) {
          rename.push([column, this.identifier('alias')]);
        }
      } while (this.acceptSymbol(','));
    }

    this.expectKeyword('FROM');
    const source = this.identifier('relation name');

    const where: WhereCondition[] = [];
    if (this.acceptKeyword('WHERE')) {
      do {
        where.push(this.condition());
      } while (this.acceptKeyword('AND'));
    }

    const orderBy: ProjectionExpression['orderBy'] = [];
    if (this.acceptKeyword('ORDER')) {
      this.expectKeyword('BY');
      do {
        const field = this.identifier('order column');
        let dir: 'asc' | 'desc' = 'asc';
        if (this.acceptKeyword('DESC')) {
          dir = 'desc';
        } else {
          this.acceptKeyword('ASC');
        }
        orderBy.push({ field, dir });
      } while (this.acceptSymbol(','));
    }

    let limit: number | undefined;
    if (this.acceptKeyword('LIMIT')) {
      const token = this.next('row limit');
      if (token.type !== 'number' || !Number.isInteger(token.value) || token.value < 0) {
        throw this.unexpected(token, 'a non-negative integer limit');
      }
      limit = token.value;
    }

    this.acceptSymbol(';');
    const trailing = this.tokens[this.position];
    if (trailing) {
      throw this.unexpected(trailing, 'end of query');
    }

    return { source, columns, distinct, where, orderBy, limit, rename };
  }

  private condition(): WhereCondition {
    const field = this.identifier('column name');
    if (this.acceptKeyword('IS')) {
      const negated = this.acceptKeyword('NOT');
      this.expectKeyword('NULL');
      return { field, op: negated ? 'is_not_null' : 'is_null' };
    }

    const operatorToken = this.next('comparison operator');
    const op = operatorToken.type === 'symbol' ? SYMBOL_OPERATORS[operatorToken.text] : undefined;
    if (!op) {
      throw this.unexpected(operatorToken, 'a comparison operator');
    }
    return { field, op, value: this.literal() };
  }

  private literal(): string | number | boolean {
    const token = this.next('literal');
    if (token.type === 'number' || token.type === 'string') {
      return token.type === 'number' ? token.value : token.text;
    }
    if (token.type === 'word' && (token.upper === 'TRUE' || token.upper === 'FALSE')) {
      return token.upper === 'TRUE';
    }
    throw this.unexpected(token, 'a literal value');
  }

  private identifier(what: string): string {
    const token = this.next(what);
    if (token.type === 'quoted' && token.text.length > 0) {
      return token.text;
    }
    if (token.type === 'word' && !KEYWORDS.has(token.upper)) {
      return token.text;
    }
    throw this.unexpected(token, `a ${what}`);
  }

  private next(what: string): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new QuerySyntaxError(`Unexpected end of query, expected ${what}.`);
    }
    this.position += 1;
    return token;
  }

  private acceptKeyword(keyword: string): boolean {
    const token = this.tokens[this.position];
    if (token?.type === 'word' && token.upper === keyword) {
      this.position += 1;
      return true;
    }
    return false;
  }

  private expectKeyword(keyword: string): void {
    const token = this.next(keyword);
    if (token.type !== 'word' || token.upper !== keyword) {
      throw this.unexpected(token, keyword);
    }
  }

  private acceptSymbol(symbol: SymbolText): boolean {
    const token = this.tokens[this.position];
    if (token?.type === 'symbol' && token.text === symbol) {
      this.position += 1;
      return true;
    }
    return false;
  }

  private unexpected(token: Token, expected: string): QuerySyntaxError {
    return new QuerySyntaxError(`Unexpected '${token.text}' at position ${token.offset + 1}, expected ${expected}.`);
  }
}

/**
 * Parses the projection query subset:
 * `SELECT [DISTINCT] * | col [AS alias], ... FROM relation [WHERE cond AND ...]
 * [ORDER BY col [ASC|DESC], ...] [LIMIT n]`.
 */
export function parseProjectionQuery(text: string): ProjectionExpression {
  return new QueryParser(tokenize(text)).parse();
}

const literalSchema = z.union([z.string(), z.number(), z.boolean()]);

const structuredProjectionSchema = z.object({
  select: z.union([
    z.literal('*'),
    z
      .array(
        z.union([
          z.string().min(1),
          z.object({ field: z.string().min(1), as: z.string().min(1).optional() }).strict()
        ])
      )
      .min(1)
  ]),
  where: z
    .array(
      z
        .object({
          field: z.string().min(1),
          op: z.enum(['eq', 'neq', 'lt', 'lte', 'gt', 'gte', 'is_null', 'is_not_null']),
          value: literalSchema.optional()
        })
        .strict()
    )
    .nullish(),
  order_by: z
    .array(
      z
        .object({
          field: z.string().min(1),
          dir: z.enum(['asc', 'desc']).default('asc')
        })
        .strict()
    )
    .nullish(),
  limit: z.number().int().nonnegative().nullish(),
  distinct: z.boolean().nullish()
});

/** Structured projections always read from the entity they are declared on. */
export function parseStructuredProjection(block: unknown, source: string): ProjectionExpression {
  const parsed = structuredProjectionSchema.safeParse(block);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new QuerySyntaxError(`Invalid structured projection: ${issues}`);
  }

  const { select, where, order_by: orderBy, limit, distinct } = parsed.data;
  const rename: Array<readonly [string, string]> = [];
  const columns =
    select === '*'
      ? '*'
      : select.map((item) => {
          if (typeof item === 'string') {
            return item;
          }
          if (item.as !== undefined) {
            rename.push([item.field, item.as]);
          }
          return item.field;
        });

  for (const condition of where ?? []) {
    const needsValue = condition.op !== 'is_null' && condition.op !== 'is_not_null';
    if (needsValue && condition.value === undefined) {
      throw new QuerySyntaxError(`Condition on '${condition.field}' with '${condition.op}' needs a value.`);
    }
  }

  return {
    source,
    columns,
    distinct: distinct ?? false,
    where: where ?? [],
    orderBy: orderBy ?? [],
    limit: limit ?? undefined,
    rename
  };
}
