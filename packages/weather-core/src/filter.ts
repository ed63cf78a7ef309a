import { FilterSyntaxError, UnknownFilterFieldError } from './errors';

export type FilterField = 'name' | 'country' | 'latitude' | 'longitude';
export type TextFilterField = Extract<FilterField, 'name' | 'country'>;
export type ComparisonOperator = '=' | '!=' | '<>' | '<' | '>' | '<=' | '>=';

export type FilterNode =
  | { type: 'comparison'; field: FilterField; operator: ComparisonOperator; value: string | number }
  | { type: 'contains'; field: TextFilterField; value: string }
  | { type: 'and'; clauses: FilterNode[] }
  | { type: 'or'; clauses: FilterNode[] };

export interface CompiledFilter {
  sql: string;
  params: Array<string | number>;
}

const FIELD_ALIASES: Readonly<Record<string, FilterField>> = {
  name: 'name',
  country: 'country',
  lat: 'latitude',
  latitude: 'latitude',
  lon: 'longitude',
  longitude: 'longitude'
};

const TEXT_FIELDS: ReadonlySet<FilterField> = new Set(['name', 'country']);
const OPERATORS: readonly ComparisonOperator[] = ['<=', '>=', '!=', '<>', '=', '<', '>'];
const OPERATOR_CHARS = new Set(['=', '!', '<', '>']);
const NUMERIC_LITERAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

type Token =
  | { kind: 'word'; text: string; position: number }
  | { kind: 'quoted'; text: string; position: number }
  | { kind: 'operator'; text: ComparisonOperator; position: number };

function isTextField(field: FilterField): field is TextFilterField {
  return TEXT_FIELDS.has(field);
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < input.length) {
    const char = input.charAt(index);

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (char === '(' || char === ')') {
      throw new FilterSyntaxError(`parentheses are not supported (position ${index + 1})`);
    }

    if (char === '"' || char === "'") {
      const close = input.indexOf(char, index + 1);
      if (close < 0) {
        throw new FilterSyntaxError(`unterminated quoted value starting at position ${index + 1}`);
      }
      tokens.push({ kind: 'quoted', text: input.slice(index + 1, close), position: index });
      index = close + 1;
      continue;
    }

    if (OPERATOR_CHARS.has(char)) {
      const operator = OPERATORS.find((candidate) => input.startsWith(candidate, index));
      if (!operator) {
        throw new FilterSyntaxError(`unexpected '${char}' at position ${index + 1}`);
      }
      tokens.push({ kind: 'operator', text: operator, position: index });
      index += operator.length;
      continue;
    }

    let end = index;
    while (end < input.length) {
      const next = input.charAt(end);
      if (/\s/.test(next) || OPERATOR_CHARS.has(next) || next === '"' || next === "'" || next === '(' || next === ')') {
        break;
      }
      end += 1;
    }
    tokens.push({ kind: 'word', text: input.slice(index, end), position: index });
    index = end;
  }

  return tokens;
}

function isKeyword(token: Token | undefined, keyword: string): boolean {
  return token?.kind === 'word' && token.text.toLowerCase() === keyword;
}

class FilterParser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): FilterNode {
    const node = this.parseOr();
    const trailing = this.tokens[this.position];
    if (trailing) {
      throw new FilterSyntaxError(`unexpected '${trailing.text}' at position ${trailing.position + 1}`);
    }
    return node;
  }

  private parseOr(): FilterNode {
    const clauses = [this.parseAnd()];
    while (isKeyword(this.peek(), 'or')) {
      this.position += 1;
      clauses.push(this.parseAnd());
    }
    return clauses.length === 1 && clauses[0] ? clauses[0] : { type: 'or', clauses };
  }

  private parseAnd(): FilterNode {
    const clauses = [this.parseClause()];
    while (isKeyword(this.peek(), 'and')) {
      this.position += 1;
      clauses.push(this.parseClause());
    }
    return clauses.length === 1 && clauses[0] ? clauses[0] : { type: 'and', clauses };
  }

  private parseClause(): FilterNode {
    const fieldToken = this.next();
    if (!fieldToken) {
      throw new FilterSyntaxError('expected a field name at end of filter');
    }
    if (fieldToken.kind !== 'word') {
      throw new FilterSyntaxError(`expected a field name at position ${fieldToken.position + 1}`);
    }
    const field = FIELD_ALIASES[fieldToken.text.toLowerCase()];
    if (!field) {
      throw new UnknownFilterFieldError(fieldToken.text);
    }

    const operatorToken = this.next();
    if (isKeyword(operatorToken, 'contains')) {
      if (!isTextField(field)) {
        throw new FilterSyntaxError(`'contains' requires a text field, got '${fieldToken.text}'`);
      }
      return { type: 'contains', field, value: this.parseValue(fieldToken.text) };
    }
    if (!operatorToken || operatorToken.kind !== 'operator') {
      throw new FilterSyntaxError(`expected an operator after '${fieldToken.text}'`);
    }

    const raw = this.parseValue(fieldToken.text);
    if (isTextField(field)) {
      return { type: 'comparison', field, operator: operatorToken.text, value: raw };
    }
    if (!NUMERIC_LITERAL.test(raw)) {
      throw new FilterSyntaxError(`'${fieldToken.text}' expects a numeric value, got '${raw}'`);
    }
    return { type: 'comparison', field, operator: operatorToken.text, value: Number(raw) };
  }

  private parseValue(fieldName: string): string {
    const first = this.peek();
    if (first?.kind === 'quoted') {
      this.position += 1;
      return first.text;
    }

    const words: string[] = [];
    let token = this.peek();
    while (token?.kind === 'word' && !isKeyword(token, 'and') && !isKeyword(token, 'or')) {
      words.push(token.text);
      this.position += 1;
      token = this.peek();
    }
    if (words.length === 0) {
      throw new FilterSyntaxError(`expected a value for '${fieldName}'`);
    }
    // Bare words are rejoined with single spaces; quote a value to keep its spacing.
    return words.join(' ');
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.position];
    if (token) {
      this.position += 1;
    }
    return token;
  }
}

/**
 * Parses `field OP value` / `field contains value` clauses joined with
 * `and` / `or` (AND binds tighter). Returns `null` for a blank expression.
 */
export function parseFilter(expression: string): FilterNode | null {
  const tokens = tokenize(expression);
  if (tokens.length === 0) {
    return null;
  }
  return new FilterParser(tokens).parse();
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function joinClauses(node: Extract<FilterNode, { type: 'and' | 'or' }>, render: (child: FilterNode) => string): string {
  const joiner = node.type === 'and' ? ' AND ' : ' OR ';
  return node.clauses
    .map((child) => {
      const text = render(child);
      return child.type === 'and' || child.type === 'or' ? `(${text})` : text;
    })
    .join(joiner);
}

/** Compiles a predicate tree into a parameterised WHERE clause body. */
export function compileFilter(node: FilterNode): CompiledFilter {
  const params: Array<string | number> = [];
  const visit = (current: FilterNode): string => {
    switch (current.type) {
      case 'comparison':
        params.push(current.value);
        return `${current.field} ${current.operator} ?`;
      case 'contains':
        params.push(`%${escapeLike(current.value)}%`);
        return `${current.field} LIKE ? ESCAPE '\\'`;
      case 'and':
      case 'or':
        return joinClauses(current, visit);
    }
  };
  return { sql: visit(node), params };
}

/** Renders a predicate tree as SQL text with inline, escaped literals. */
export function renderFilter(node: FilterNode): string {
  switch (node.type) {
    case 'comparison': {
      const literal = typeof node.value === 'number' ? String(node.value) : quoteLiteral(node.value);
      return `${node.field} ${node.operator} ${literal}`;
    }
    case 'contains': {
      const pattern = escapeLike(node.value);
      const escapeClause = pattern === node.value ? '' : " ESCAPE '\\'";
      return `${node.field} LIKE ${quoteLiteral(`%${pattern}%`)}${escapeClause}`;
    }
    case 'and':
    case 'or':
      return joinClauses(node, renderFilter);
  }
}
