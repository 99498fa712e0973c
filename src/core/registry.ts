/**
 * Capability registry: the catalog of tools the reasoning backend may call.
 */

import type {z} from 'zod'
import {zodToJsonSchema} from 'zod-to-json-schema'
import {ArgumentValidationError, DuplicateToolError, ExecutionError, UnknownToolError, errorMessage} from './errors.js'

export type ToolContext = {
  signal: AbortSignal
}

export interface ToolSpec<TInput extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string
  description: string
  /** Use a strict object schema: arguments are never coerced or stripped. */
  input: TInput
  execute: (args: z.output<TInput>, context: ToolContext) => Promise<unknown>
}

export type ToolDescription = {
  name: string
  description: string
  parameters: Record<string, unknown>
}

type RegisteredTool = {
  readonly description: ToolDescription
  readonly run: (args: unknown, context: ToolContext) => Promise<unknown>
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

export class CapabilityRegistry {
  private readonly tools = new Map<string, RegisteredTool>()

  register<TInput extends z.ZodTypeAny>(spec: ToolSpec<TInput>): void {
    if (this.tools.has(spec.name)) throw new DuplicateToolError(spec.name)

    const {name, input, execute} = spec
    const description: ToolDescription = Object.freeze({
      name,
      description: spec.description,
      parameters: zodToJsonSchema(input, {$refStrategy: 'none'})
    })

    this.tools.set(
      name,
      Object.freeze({
        description,
        run: async (args: unknown, context: ToolContext) => {
          const parsed = input.safeParse(args)
          if (!parsed.success) throw new ArgumentValidationError(name, formatIssues(parsed.error))
          try {
            return await execute(parsed.data, context)
          } catch (error) {
            if (error instanceof ExecutionError) throw error
            throw new ExecutionError(name, errorMessage(error), {cause: error})
          }
        }
      })
    )
  }

  describeAll(): ToolDescription[] {
    return [...this.tools.values()].map((tool) => tool.description)
  }

  async invoke(name: string, args: unknown, context: ToolContext): Promise<unknown> {
    const tool = this.tools.get(name)
    if (!tool) throw new UnknownToolError(name)
    return tool.run(args, context)
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  names(): string[] {
    return [...this.tools.keys()]
  }

  get size(): number {
    return this.tools.size
  }
}
