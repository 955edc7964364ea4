import { z } from 'zod'
import { defineTool } from '../../types'
import { evaluateExpression } from './expression'

export const calculatorTool = defineTool({
    name: 'calculator',
    description: 'Evaluate an arithmetic expression. Supports + - * / % ** and parentheses.',
    category: 'math',
    inputSchema: z.object({
        expression: z.string().describe('Arithmetic expression, e.g. "2 + 2 * 3"'),
    }).strict(),

    execute({ expression }) {
        return evaluateExpression(expression)
    },
})
