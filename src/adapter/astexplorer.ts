import { parse, type ParseOptions } from '../index'

export default {
  id: 'calc-expr',
  displayName: 'Arithmetic (calc-expr)',
  version: '0.1.0',
  showInMenu: true,

  locationProps: new Set(['start', 'end', 'loc']),

  loadParser(callback: (parser: { parse: typeof parse }) => void) {
    callback({ parse })
  },

  parse(parser: { parse: typeof parse }, code: string, options?: ParseOptions) {
    return parser.parse(code, options)
  },

  nodeToRange(node: { start?: number; end?: number }): [number, number] | null {
    if (node.start != null && node.end != null) {
      return [node.start, node.end]
    }
    return null
  },

  getDefaultOptions(): ParseOptions {
    return { loc: false, allowTrailingTokens: false }
  },
}
