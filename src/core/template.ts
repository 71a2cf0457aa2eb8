import {TemplateError} from '../errors.js'

/**
 * Node of a template context. Contexts are small trees: scalars at the
 * leaves, lists addressed by zero-based index, objects addressed by field.
 */
export type TemplateNode =
  | {kind: 'scalar'; value: string}
  | {kind: 'list'; items: TemplateNode[]}
  | {kind: 'object'; fields: ReadonlyMap<string, TemplateNode>}

export type TemplateContext = Extract<TemplateNode, {kind: 'object'}>

/** Plain data accepted by {@link toNode}. */
export type PlainValue = string | PlainValue[] | {[key: string]: PlainValue}

export function scalar(value: string): TemplateNode {
  return {kind: 'scalar', value}
}

export function list(items: TemplateNode[]): TemplateNode {
  return {kind: 'list', items}
}

export function object(fields: Record<string, TemplateNode>): TemplateContext {
  return {kind: 'object', fields: new Map(Object.entries(fields))}
}

export function toNode(value: PlainValue): TemplateNode {
  if (typeof value === 'string') {
    return scalar(value)
  }

  if (Array.isArray(value)) {
    return list(value.map(item => toNode(item)))
  }

  return toContext(value)
}

export function toContext(fields: Record<string, PlainValue>): TemplateContext {
  const nodes: Record<string, TemplateNode> = {}
  for (const [key, value] of Object.entries(fields)) {
    nodes[key] = toNode(value)
  }

  return object(nodes)
}

// -- Parsing -----------------------------------------------------------------

export type TextPart = {type: 'text'; value: string}
export type ValuePart = {type: 'value'; path: string[]}
export type IfPart = {type: 'if'; path: string[]; then: Part[]; otherwise: Part[]}
export type Part = TextPart | ValuePart | IfPart

const pathPattern = /^[\w-]+(?:\.[\w-]+)*$/

function malformed(template: string, message: string): TemplateError {
  return new TemplateError('MalformedExpression', '', `Malformed template '${template}': ${message}`)
}

function parsePath(template: string, expression: string): string[] {
  if (!pathPattern.test(expression)) {
    throw malformed(template, `invalid expression "{{${expression}}}"`)
  }

  return expression.split('.')
}

export function parseTemplate(template: string): Part[] {
  const root: Part[] = []
  const blocks: Array<{block: IfPart; inElse: boolean}> = []
  let current = root
  let index = 0

  while (index < template.length) {
    const open = template.indexOf('{{', index)
    if (open === -1) {
      current.push({type: 'text', value: template.slice(index)})
      break
    }

    if (open > index) {
      current.push({type: 'text', value: template.slice(index, open)})
    }

    const close = template.indexOf('}}', open + 2)
    if (close === -1) {
      throw malformed(template, `unclosed expression at offset ${open}`)
    }

    const expression = template.slice(open + 2, close).trim()
    index = close + 2

    if (expression.startsWith('#')) {
      const match = /^#(\S+)\s+(\S+)$/.exec(expression)
      if (match?.[1] !== 'if') {
        throw malformed(template, `unsupported block "{{${expression}}}"`)
      }

      const block: IfPart = {type: 'if', path: parsePath(template, match[2]), then: [], otherwise: []}
      current.push(block)
      blocks.push({block, inElse: false})
      current = block.then
      continue
    }

    if (expression === 'else') {
      const innermost = blocks.at(-1)
      if (!innermost || innermost.inElse) {
        throw malformed(template, '{{else}} outside of an {{#if}} block')
      }

      innermost.inElse = true
      current = innermost.block.otherwise
      continue
    }

    if (expression.startsWith('/')) {
      if (expression !== '/if' || blocks.length === 0) {
        throw malformed(template, `unexpected "{{${expression}}}"`)
      }

      blocks.pop()
      const parent = blocks.at(-1)
      current = parent ? (parent.inElse ? parent.block.otherwise : parent.block.then) : root
      continue
    }

    current.push({type: 'value', path: parsePath(template, expression)})
  }

  if (blocks.length > 0) {
    throw malformed(template, 'unclosed {{#if}} block')
  }

  return root
}

// -- Rendering ---------------------------------------------------------------

/** `yy-mm-dd` in UTC. */
export function formatDate(date: Date): string {
  const yy = String(date.getUTCFullYear() % 100).padStart(2, '0')
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0')
  const dd = String(date.getUTCDate()).padStart(2, '0')
  return `${yy}-${mm}-${dd}`
}

function isTruthy(node: TemplateNode): boolean {
  switch (node.kind) {
    case 'scalar': {
      return node.value !== ''
    }

    case 'list': {
      return node.items.length > 0
    }

    case 'object': {
      return node.fields.size > 0
    }
  }
}

/**
 * Renders `{{path}}`, `{{#if path}}…{{else}}…{{/if}}` and the built-in
 * `{{date}}` token against a context tree.
 *
 * The date is fixed when the engine is created, so every template rendered
 * by one engine sees the same value. Substituted text is never parsed again.
 */
export class TemplateEngine {
  readonly date: string
  private readonly parsed = new Map<string, Part[]>()

  constructor(options?: {now?: Date}) {
    this.date = formatDate(options?.now ?? new Date())
  }

  render(template: string, context: TemplateContext): string {
    let parts = this.parsed.get(template)
    if (!parts) {
      parts = parseTemplate(template)
      this.parsed.set(template, parts)
    }

    return this.renderParts(template, parts, context)
  }

  renderAll(templates: string[], context: TemplateContext): string[] {
    return templates.map(template => this.render(template, context))
  }

  /** Resolves a dotted path, throwing a {@link TemplateError} that carries the path. */
  lookup(template: string, context: TemplateContext, path: string[]): TemplateNode {
    let node: TemplateNode = context
    for (const [index, segment] of path.entries()) {
      const at = path.slice(0, index + 1).join('.')

      if (node.kind === 'object') {
        const next: TemplateNode | undefined = node.fields.get(segment) ?? (index === 0 && segment === 'date' ? scalar(this.date) : undefined)
        if (!next) {
          throw new TemplateError('UnknownField', at, `Unknown field "${at}" in template '${template}'`)
        }

        node = next
        continue
      }

      if (node.kind === 'list') {
        if (!/^\d+$/.test(segment)) {
          throw new TemplateError('UnknownField', at, `"${segment}" is not an index of list "${path.slice(0, index).join('.')}" in template '${template}'`)
        }

        const item = node.items[Number(segment)]
        if (!item) {
          throw new TemplateError('IndexOutOfRange', at, `Index "${at}" is out of range (${node.items.length} items) in template '${template}'`)
        }

        node = item
        continue
      }

      throw new TemplateError('UnknownField', at, `Unknown field "${at}": "${path.slice(0, index).join('.')}" is a scalar in template '${template}'`)
    }

    return node
  }

  private renderParts(template: string, parts: Part[], context: TemplateContext): string {
    let output = ''
    for (const part of parts) {
      switch (part.type) {
        case 'text': {
          output += part.value
          break
        }

        case 'value': {
          const node = this.lookup(template, context, part.path)
          if (node.kind !== 'scalar') {
            const at = part.path.join('.')
            throw new TemplateError('UnknownField', at, `"${at}" is a ${node.kind}, not a value, in template '${template}'`)
          }

          output += node.value
          break
        }

        case 'if': {
          const branch = this.test(template, context, part.path) ? part.then : part.otherwise
          output += this.renderParts(template, branch, context)
          break
        }
      }
    }

    return output
  }

  private test(template: string, context: TemplateContext, path: string[]): boolean {
    try {
      return isTruthy(this.lookup(template, context, path))
    } catch (error: unknown) {
      if (error instanceof TemplateError) {
        return false
      }

      throw error
    }
  }
}
