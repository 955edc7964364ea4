/**
 * Safe arithmetic evaluator. Supports + - * / % **, unary + and -, parentheses
 * and decimal literals. No names, calls or other syntax.
 *
 * Grammar (lowest to highest precedence):
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/' | '%') unary)*
 *   unary   := ('+' | '-') unary | power
 *   power   := primary ('**' unary)?        right-associative
 *   primary := NUMBER | '(' expr ')'
 */

type Token =
    | { kind: 'num'; value: number }
    | { kind: 'op'; value: '+' | '-' | '*' | '/' | '%' | '**' }
    | { kind: 'paren'; value: '(' | ')' }

const NUMBER = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/

function tokenize(source: string): Token[] {
    const tokens: Token[] = []
    let i = 0

    while (i < source.length) {
        const ch = source.charAt(i)
        if (/\s/.test(ch)) {
            i++
            continue
        }
        const num = NUMBER.exec(source.slice(i))
        if (num) {
            tokens.push({ kind: 'num', value: Number(num[0]) })
            i += num[0].length
            continue
        }
        if (source.startsWith('**', i)) {
            tokens.push({ kind: 'op', value: '**' })
            i += 2
            continue
        }
        if (ch === '+' || ch === '-' || ch === '*' || ch === '/' || ch === '%') {
            tokens.push({ kind: 'op', value: ch })
            i++
            continue
        }
        if (ch === '(' || ch === ')') {
            tokens.push({ kind: 'paren', value: ch })
            i++
            continue
        }
        throw new Error(`Disallowed syntax in expression: '${ch}'`)
    }

    return tokens
}

class Parser {
    private pos = 0

    constructor(private readonly tokens: Token[]) {}

    parse(): number {
        if (this.tokens.length === 0) throw new Error('Invalid expression: empty')
        const value = this.expr()
        if (this.pos < this.tokens.length) throw new Error('Invalid expression: unexpected trailing input')
        return value
    }

    private peek(): Token | undefined {
        return this.tokens[this.pos]
    }

    private takeOp(...ops: string[]): string | null {
        const tok = this.peek()
        if (tok?.kind === 'op' && ops.includes(tok.value)) {
            this.pos++
            return tok.value
        }
        return null
    }

    private expr(): number {
        let left = this.term()
        for (let op = this.takeOp('+', '-'); op; op = this.takeOp('+', '-')) {
            const right = this.term()
            left = op === '+' ? left + right : left - right
        }
        return left
    }

    private term(): number {
        let left = this.unary()
        for (let op = this.takeOp('*', '/', '%'); op; op = this.takeOp('*', '/', '%')) {
            const right = this.unary()
            if (right === 0 && op !== '*') throw new Error(op === '/' ? 'division by zero' : 'modulo by zero')
            if (op === '*') left = left * right
            else if (op === '/') left = left / right
            else left = left - Math.floor(left / right) * right   // sign follows the divisor
        }
        return left
    }

    private unary(): number {
        const op = this.takeOp('+', '-')
        if (op === '-') return -this.unary()
        if (op === '+') return this.unary()
        return this.power()
    }

    private power(): number {
        const base = this.primary()
        if (this.takeOp('**')) return base ** this.unary()
        return base
    }

    private primary(): number {
        const tok = this.peek()
        if (!tok) throw new Error('Invalid expression: unexpected end')
        this.pos++

        if (tok.kind === 'num') return tok.value
        if (tok.kind === 'paren' && tok.value === '(') {
            const value = this.expr()
            const close = this.peek()
            if (close?.kind !== 'paren' || close.value !== ')') throw new Error('Invalid expression: missing )')
            this.pos++
            return value
        }
        throw new Error(`Invalid expression: unexpected '${tok.value}'`)
    }
}

export function evaluateExpression(expression: string): number {
    return new Parser(tokenize(expression)).parse()
}
