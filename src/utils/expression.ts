import { create, all } from 'mathjs';
import type { MathNode } from 'mathjs';
import { AnalysisError, ExpressionError, ShapeMismatchError, getErrorMessage } from './errors';

// The parser only: nothing from the mathjs function namespace is ever
// called. Evaluation walks the tree against VARIABLE and CONTEXT below.
const math = create(all, {});

type Operand = number | Float64Array;
type Unary = (a: number) => number;
type Binary = (a: number, b: number) => number;

type Entry =
    | { kind: 'constant'; value: number }
    | { kind: 'unary'; fn: Unary }
    | { kind: 'binary'; fn: Binary }
    | { kind: 'reduce'; fn: (values: Float64Array) => number }
    | { kind: 'namespace'; members: ReadonlyMap<string, Entry> };

const VARIABLE = 'x';
const NAMESPACE = 'np';

const constant = (value: number): Entry => ({ kind: 'constant', value });
const unary = (fn: Unary): Entry => ({ kind: 'unary', fn });
const binary = (fn: Binary): Entry => ({ kind: 'binary', fn });
const reduce = (fn: (values: Float64Array) => number): Entry => ({ kind: 'reduce', fn });

// Floored modulo; the result takes the sign of the divisor.
const floorMod: Binary = (a, b) => (b === 0 ? NaN : a - Math.floor(a / b) * b);

// NaN-propagating extremum
const extremum = (pick: Binary) => (values: Float64Array) => {
    if (values.length === 0) return NaN;
    let acc = values[0];
    for (let i = 1; i < values.length; i++) {
        if (Number.isNaN(values[i])) return NaN;
        acc = pick(acc, values[i]);
    }
    return acc;
};

const sum = (values: Float64Array) => {
    let total = 0;
    for (let i = 0; i < values.length; i++) total += values[i];
    return total;
};

const ELEMENTARY: [string, Entry][] = [
    ['sin', unary(Math.sin)],
    ['cos', unary(Math.cos)],
    ['tan', unary(Math.tan)],
    ['asin', unary(Math.asin)],
    ['acos', unary(Math.acos)],
    ['atan', unary(Math.atan)],
    ['sinh', unary(Math.sinh)],
    ['cosh', unary(Math.cosh)],
    ['tanh', unary(Math.tanh)],
    ['exp', unary(Math.exp)],
    ['log', unary(Math.log)],
    ['log10', unary(Math.log10)],
    ['sqrt', unary(Math.sqrt)],
    ['abs', unary(Math.abs)],
    ['floor', unary(Math.floor)],
    ['ceil', unary(Math.ceil)],
    ['pow', binary(Math.pow)],
    ['atan2', binary(Math.atan2)],
];

const NUMERIC_HANDLE = new Map<string, Entry>([
    ['pi', constant(Math.PI)],
    ['e', constant(Math.E)],
    ['inf', constant(Infinity)],
    ['nan', constant(NaN)],
    ...ELEMENTARY,
    ['arcsin', unary(Math.asin)],
    ['arccos', unary(Math.acos)],
    ['arctan', unary(Math.atan)],
    ['arcsinh', unary(Math.asinh)],
    ['arccosh', unary(Math.acosh)],
    ['arctanh', unary(Math.atanh)],
    ['square', unary((a) => a * a)],
    ['cbrt', unary(Math.cbrt)],
    ['sign', unary(Math.sign)],
    ['log2', unary(Math.log2)],
    ['log1p', unary(Math.log1p)],
    ['expm1', unary(Math.expm1)],
    ['exp2', unary((a) => Math.pow(2, a))],
    ['trunc', unary(Math.trunc)],
    ['arctan2', binary(Math.atan2)],
    ['power', binary(Math.pow)],
    ['hypot', binary((a, b) => Math.hypot(a, b))],
    ['maximum', binary((a, b) => Math.max(a, b))],
    ['minimum', binary((a, b) => Math.min(a, b))],
    ['sum', reduce(sum)],
    ['mean', reduce((values) => (values.length === 0 ? NaN : sum(values) / values.length))],
    ['min', reduce(extremum((a, b) => Math.min(a, b)))],
    ['max', reduce(extremum((a, b) => Math.max(a, b)))],
]);

const CONTEXT: ReadonlyMap<string, Entry> = new Map<string, Entry>([
    ['pi', constant(Math.PI)],
    ['e', constant(Math.E)],
    ...ELEMENTARY,
    [NAMESPACE, { kind: 'namespace', members: NUMERIC_HANDLE }],
]);

const BINARY_OPERATORS: ReadonlyMap<string, Binary> = new Map<string, Binary>([
    ['add', (a, b) => a + b],
    ['subtract', (a, b) => a - b],
    ['multiply', (a, b) => a * b],
    ['dotMultiply', (a, b) => a * b],
    ['divide', (a, b) => a / b],
    ['dotDivide', (a, b) => a / b],
    ['pow', Math.pow],
    ['dotPow', Math.pow],
    ['mod', floorMod],
]);

const UNARY_OPERATORS: ReadonlyMap<string, Unary> = new Map<string, Unary>([
    ['unaryMinus', (a) => -a],
    ['unaryPlus', (a) => a],
]);

export const SUPPORTED_NAMES: readonly string[] = [VARIABLE, ...CONTEXT.keys()];

const mapUnary = (a: Operand, fn: Unary): Operand =>
    typeof a === 'number' ? fn(a) : a.map((v) => fn(v));

const mapBinary = (a: Operand, b: Operand, fn: Binary): Operand => {
    if (typeof a === 'number') {
        return typeof b === 'number' ? fn(a, b) : b.map((v) => fn(a, v));
    }
    if (typeof b === 'number') return a.map((v) => fn(v, b));
    if (a.length !== b.length) {
        throw new ShapeMismatchError(`Cannot combine vectors of length ${a.length} and ${b.length}.`);
    }
    const out = new Float64Array(a.length);
    for (let i = 0; i < a.length; i++) out[i] = fn(a[i], b[i]);
    return out;
};

type Callee = { entry: Entry; label: string };

const resolveCallee = (node: MathNode): Callee => {
    if (math.isSymbolNode(node)) {
        if (node.name === VARIABLE) throw new ExpressionError(`'${VARIABLE}' is not a function`);
        const entry = CONTEXT.get(node.name);
        if (!entry) throw new ExpressionError(`Unknown name '${node.name}'`);
        return { entry, label: node.name };
    }

    if (math.isAccessorNode(node)) {
        const target = node.object;
        if (!math.isSymbolNode(target) || target.name !== NAMESPACE || !node.index.dotNotation) {
            throw new ExpressionError(`Unsupported member access '${node.toString()}'`);
        }
        const entry = NUMERIC_HANDLE.get(node.name);
        if (!entry) throw new ExpressionError(`Unknown name '${NAMESPACE}.${node.name}'`);
        return { entry, label: `${NAMESPACE}.${node.name}` };
    }

    throw new ExpressionError(`Unsupported syntax '${node.toString()}'`);
};

const valueOf = ({ entry, label }: Callee): Operand => {
    switch (entry.kind) {
        case 'constant':
            return entry.value;
        case 'namespace':
            return failNamespace(label);
        default:
            throw new ExpressionError(`'${label}' is a function; call it as ${label}(...)`);
    }
};

const failNamespace = (label: string): never => {
    throw new ExpressionError(`'${label}' must be followed by a member, e.g. ${label}.sin(x)`);
};

const expectArity = (label: string, args: MathNode[], count: number) => {
    if (args.length !== count) {
        const noun = count === 1 ? 'argument' : 'arguments';
        throw new ExpressionError(`${label}() takes ${count} ${noun}, got ${args.length}`);
    }
};

const evaluateNode = (node: MathNode, x: Float64Array): Operand => {
    if (math.isParenthesisNode(node)) {
        return evaluateNode(node.content, x);
    }

    if (math.isConstantNode(node)) {
        const value: unknown = node.value;
        if (typeof value !== 'number') {
            throw new ExpressionError(`Unsupported literal ${node.toString()}`);
        }
        return value;
    }

    if (math.isSymbolNode(node)) {
        if (node.name === VARIABLE) return x;
        return valueOf(resolveCallee(node));
    }

    if (math.isAccessorNode(node)) {
        return valueOf(resolveCallee(node));
    }

    if (math.isOperatorNode(node)) {
        // A postfix % parses as a division by 100
        if ('isPercentage' in node && node.isPercentage === true) {
            throw new ExpressionError("percentages are not supported; '%' is modulo");
        }
        const args = node.args;
        if (args.length === 1) {
            const op = UNARY_OPERATORS.get(node.fn);
            if (op) return mapUnary(evaluateNode(args[0], x), op);
        } else if (args.length === 2) {
            const op = BINARY_OPERATORS.get(node.fn);
            if (op) return mapBinary(evaluateNode(args[0], x), evaluateNode(args[1], x), op);
        }
        throw new ExpressionError(`Unsupported operator '${node.op}'`);
    }

    if (math.isFunctionNode(node)) {
        const callee = resolveCallee(node.fn);
        const { entry, label } = callee;
        const args = node.args;

        switch (entry.kind) {
            case 'unary':
                expectArity(label, args, 1);
                return mapUnary(evaluateNode(args[0], x), entry.fn);
            case 'binary':
                expectArity(label, args, 2);
                return mapBinary(evaluateNode(args[0], x), evaluateNode(args[1], x), entry.fn);
            case 'reduce': {
                expectArity(label, args, 1);
                const operand = evaluateNode(args[0], x);
                return entry.fn(typeof operand === 'number' ? Float64Array.of(operand) : operand);
            }
            case 'namespace':
                return failNamespace(label);
            case 'constant':
                throw new ExpressionError(`'${label}' is not a function`);
        }
    }

    if (math.isBlockNode(node)) {
        throw new ExpressionError('only a single expression is allowed');
    }
    if (math.isAssignmentNode(node) || math.isFunctionAssignmentNode(node)) {
        throw new ExpressionError('assignments are not allowed');
    }

    throw new ExpressionError(`Unsupported syntax '${node.toString()}'`);
};

/**
 * Accepts `y = ...` input and `**` for powers (the parser's own power
 * operator is `^`).
 */
export const normalizeExpression = (expr: string): string =>
    expr
        .trim()
        .replace(/^y\s*=\s*/i, '')
        .replace(/\*\*/g, '^')
        .trim();

export const parseExpression = (expr: string): MathNode => {
    const normalized = normalizeExpression(expr);
    if (normalized === '') throw new ExpressionError('Expression is empty.');

    try {
        return math.parse(normalized);
    } catch (error) {
        throw new ExpressionError(`Invalid expression: ${getErrorMessage(error)}`);
    }
};

const referencesVariable = (root: MathNode) =>
    root.filter((node) => math.isSymbolNode(node) && node.name === VARIABLE).length > 0;

/**
 * Evaluates `expr` element-wise over `x`.
 *
 * Only the names in CONTEXT (plus `x`) resolve. Arithmetic is IEEE-754, so
 * division by zero gives Infinity/NaN rather than an error. An expression
 * that does not mention `x` is constant and is broadcast to `x.length`.
 */
export const evaluate = (expr: string, x: ArrayLike<number>): Float64Array => {
    const root = parseExpression(expr);
    const domain = Float64Array.from(x);

    let result: Operand;
    try {
        result = evaluateNode(root, domain);
    } catch (error) {
        if (error instanceof ShapeMismatchError) throw error;
        const detail = error instanceof AnalysisError ? error.message : getErrorMessage(error);
        throw new ExpressionError(`Invalid expression: ${detail}`);
    }

    if (typeof result === 'number') {
        if (referencesVariable(root)) {
            throw new ShapeMismatchError('The expression did not evaluate to a vector of y values.');
        }
        return new Float64Array(domain.length).fill(result);
    }

    if (result.length !== domain.length) {
        throw new ShapeMismatchError('The expression did not evaluate to a vector of y values.');
    }

    return result === domain ? Float64Array.from(result) : result;
};
