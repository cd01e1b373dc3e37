import { Tool } from '../types.js';
import { isRecord, readDataFile } from '../../utils/dataFiles.js';

export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

type Token = { kind: 'number'; value: number } | { kind: 'operator'; value: string };

const OPERATORS = '+-*/%^()';
const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)/;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const char = expression[i];
    if (/\s/.test(char)) {
      i++;
      continue;
    }

    const number = NUMBER_PATTERN.exec(expression.slice(i));
    if (number) {
      tokens.push({ kind: 'number', value: Number(number[0]) });
      i += number[0].length;
      continue;
    }

    if (!OPERATORS.includes(char)) {
      throw new ExpressionError(`Unexpected character "${char}"`);
    }
    tokens.push({ kind: 'operator', value: char });
    i++;
  }

  return tokens;
}

/**
 * Recursive descent over + - * / ^ and parentheses. A postfix % divides by
 * 100; ^ binds tighter than unary minus and associates to the right.
 */
class ExpressionParser {
  private tokens: Token[];
  private position = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): number {
    if (this.tokens.length === 0) {
      throw new ExpressionError('Empty expression');
    }
    const value = this.sum();
    if (this.position < this.tokens.length) {
      throw new ExpressionError(`Unexpected "${this.tokens[this.position].value}"`);
    }
    return value;
  }

  private peekOperator(): string | null {
    if (this.position >= this.tokens.length) return null;
    const token = this.tokens[this.position];
    return token.kind === 'operator' ? token.value : null;
  }

  private sum(): number {
    let value = this.product();
    for (let op = this.peekOperator(); op === '+' || op === '-'; op = this.peekOperator()) {
      this.position++;
      const right = this.product();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private product(): number {
    let value = this.unary();
    for (let op = this.peekOperator(); op === '*' || op === '/'; op = this.peekOperator()) {
      this.position++;
      const right = this.unary();
      if (op === '/' && right === 0) {
        throw new ExpressionError('Cannot divide by zero');
      }
      value = op === '*' ? value * right : value / right;
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOperator();
    if (op === '-' || op === '+') {
      this.position++;
      const operand = this.unary();
      return op === '-' ? -operand : operand;
    }
    return this.power();
  }

  private power(): number {
    const base = this.percent();
    if (this.peekOperator() === '^') {
      this.position++;
      return Math.pow(base, this.unary());
    }
    return base;
  }

  private percent(): number {
    let value = this.primary();
    while (this.peekOperator() === '%') {
      this.position++;
      value /= 100;
    }
    return value;
  }

  private primary(): number {
    if (this.position >= this.tokens.length) {
      throw new ExpressionError('Expression ends too early');
    }

    const token = this.tokens[this.position++];
    if (token.kind === 'number') {
      return token.value;
    }
    if (token.value === '(') {
      const value = this.sum();
      if (this.peekOperator() !== ')') {
        throw new ExpressionError('Missing closing parenthesis');
      }
      this.position++;
      return value;
    }
    throw new ExpressionError(`Unexpected "${token.value}"`);
  }
}

export function evaluateExpression(expression: string): number {
  const value = new ExpressionParser(tokenize(expression)).parse();
  if (!Number.isFinite(value)) {
    throw new ExpressionError('Result is not a finite number');
  }
  return value;
}

export function formatNumber(value: number, decimals: number = 6): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(decimals)));
}

const WORD_OPERATORS: [RegExp, string][] = [
  [/\bplus\b/gi, '+'],
  [/\bminus\b/gi, '-'],
  [/\b(?:times|multiplied\s+by)\b|×/gi, '*'],
  [/\bdivided\s+by\b|÷/gi, '/'],
  [/\bto\s+the\s+power\s+of\b/gi, '^']
];

/** The arithmetic in a request, with spelled-out operators turned into symbols. */
export function extractExpression(query: string): string {
  let text = query.replace(/(\d),(?=\d{3}\b)/g, '$1');
  for (const [pattern, symbol] of WORD_OPERATORS) {
    text = text.replace(pattern, symbol);
  }
  return text
    .replace(/[^0-9+\-*/().%^\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/[.\s]+$/, '')
    .trim();
}

const PERCENT_OF_PATTERN = /(\d+(?:\.\d+)?)\s*%\s*of\s+(\d+(?:\.\d+)?)/i;

export const calculateExpressionTool: Tool = {
  name: 'calculate_expression',
  invoke: async query => {
    const percentOf = PERCENT_OF_PATTERN.exec(query);
    if (percentOf) {
      const result = (Number(percentOf[1]) * Number(percentOf[2])) / 100;
      return `${percentOf[1]}% of ${percentOf[2]} = ${formatNumber(result)}`;
    }

    const expression = extractExpression(query);
    if (!expression) {
      throw new ExpressionError('No arithmetic expression found in the request');
    }
    return `${expression} = ${formatNumber(evaluateExpression(expression))}`;
  }
};

export interface UnitTable {
  /** Factor from each unit to its dimension's base unit, by dimension. */
  dimensions: Record<string, Record<string, number>>;
  aliases: Record<string, string>;
}

function isNumberRecord(value: unknown): value is Record<string, number> {
  return isRecord(value) && Object.values(value).every(item => typeof item === 'number' && item > 0);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(item => typeof item === 'string');
}

export function loadUnitTable(fileName: string = 'units.json'): UnitTable {
  const data = readDataFile(fileName);
  if (!isRecord(data) || !isRecord(data.dimensions) || !isStringRecord(data.aliases)) {
    throw new Error(`${fileName} must contain "dimensions" and "aliases" objects`);
  }

  const dimensions: Record<string, Record<string, number>> = {};
  for (const [name, units] of Object.entries(data.dimensions)) {
    if (!isNumberRecord(units)) {
      throw new Error(`${fileName}: dimension ${name} must map units to positive factors`);
    }
    dimensions[name] = units;
  }

  return { dimensions, aliases: data.aliases };
}

const TEMPERATURES = ['celsius', 'fahrenheit', 'kelvin'] as const;
type Temperature = typeof TEMPERATURES[number];

function isTemperature(unit: string): unit is Temperature {
  return TEMPERATURES.some(temperature => temperature === unit);
}

function toCelsius(value: number, unit: Temperature): number {
  switch (unit) {
    case 'celsius':
      return value;
    case 'fahrenheit':
      return ((value - 32) * 5) / 9;
    case 'kelvin':
      return value - 273.15;
  }
}

function fromCelsius(value: number, unit: Temperature): number {
  switch (unit) {
    case 'celsius':
      return value;
    case 'fahrenheit':
      return (value * 9) / 5 + 32;
    case 'kelvin':
      return value + 273.15;
  }
}

export function canonicalUnit(table: UnitTable, raw: string): string {
  const lower = raw.toLowerCase();
  return table.aliases[lower] ?? lower;
}

function findDimension(table: UnitTable, unit: string): { name: string; factor: number } | null {
  for (const [name, units] of Object.entries(table.dimensions)) {
    if (unit in units) {
      return { name, factor: units[unit] };
    }
  }
  return null;
}

export interface Conversion {
  value: number;
  from: string;
  to: string;
  result: number;
}

export function convertUnits(table: UnitTable, value: number, fromUnit: string, toUnit: string): Conversion {
  const from = canonicalUnit(table, fromUnit);
  const to = canonicalUnit(table, toUnit);

  if (isTemperature(from) || isTemperature(to)) {
    if (!isTemperature(from) || !isTemperature(to)) {
      throw new Error(`Cannot convert ${from} to ${to}`);
    }
    return { value, from, to, result: fromCelsius(toCelsius(value, from), to) };
  }

  const source = findDimension(table, from);
  if (!source) throw new Error(`Unknown unit: ${fromUnit}`);
  const target = findDimension(table, to);
  if (!target) throw new Error(`Unknown unit: ${toUnit}`);

  if (source.name !== target.name) {
    throw new Error(`Cannot convert ${from} (${source.name}) to ${to} (${target.name})`);
  }
  return { value, from, to, result: (value * source.factor) / target.factor };
}

const CONVERSION_PATTERN = /(-?\d+(?:\.\d+)?)\s*°?\s*([a-z]+)\s+(?:to|in|into)\s+°?([a-z]+)/i;

export function createMathTools(units: UnitTable = loadUnitTable()): Tool[] {
  const unitConverter: Tool = {
    name: 'unit_converter',
    invoke: async query => {
      const match = CONVERSION_PATTERN.exec(query);
      if (!match) {
        throw new Error('Say what to convert, e.g. "convert 5 km to miles"');
      }

      const { value, from, to, result } = convertUnits(units, Number(match[1]), match[2], match[3]);
      return `${formatNumber(value)} ${from} = ${formatNumber(result, 4)} ${to}`;
    }
  };

  return [calculateExpressionTool, unitConverter];
}
