import { parseExpression, ParseOptions, SourceParseResult } from '../index'

type KestrelParser = { parse: typeof parseExpression }

export default {
  id: 'kestrel-parser',
  displayName: 'Kestrel (kestrel-parser)',
  version: '0.1.0',
  showInMenu: true,

  locationProps: new Set(['start', 'end', 'loc']),

  loadParser(callback: (parser: KestrelParser) => void) {
    callback({ parse: parseExpression })
  },

  parse(parser: KestrelParser, code: string, options?: ParseOptions): SourceParseResult {
    return parser.parse(code, options)
  },

  nodeToRange(node: { start?: number; end?: number }): [number, number] | null {
    if (node.start != null && node.end != null) {
      return [node.start, node.end]
    }
    return null
  },

  getDefaultOptions(): ParseOptions {
    return { loc: false }
  },
}
