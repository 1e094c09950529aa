/**
 * Tern Module
 * Exports lexer, parser, visitor dispatch, printer, and AST types
 */

export {
  KEYWORDS,
  createLexerState,
  scanToken,
  tokenize,
  type LexerState,
  type TokenizeOptions,
} from './lexer/index.js';
export {
  parse,
  parseSource,
  Parser,
  synchronize,
  createParserState,
  type ParseOptions,
  type ParserState,
} from './parser/index.js';
export {
  acceptExpr,
  acceptStmt,
  type ExprVisitor,
  type StmtVisitor,
} from './visitor.js';
export { AstPrinter, printExpr } from './printer.js';

export * from './types.js';
