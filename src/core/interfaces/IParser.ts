/**
 * IParser - Source parser interface
 *
 * Turns source files into syntax trees, abstracting over the parser
 * implementation.
 *
 * @module
 */

import type { CancellationToken } from "../../utils/async.js";
import type { SourceFile } from "../../types/index.js";
import type { SyntaxTree } from "../parser/ast.js";

/**
 * A source file together with its syntax tree.
 */
export interface ParsedSourceFile {
  file: SourceFile;
  tree: SyntaxTree;
}

/**
 * Parser interface for converting source files to syntax trees.
 *
 * @example
 * ```typescript
 * const parser: IParser = new ErlangSourceParser([".erl", ".hrl"]);
 * const { file, tree } = await parser.parseFile(filePath, rootPath);
 * ```
 */
export interface IParser {
  /** File extensions this parser reads, with the leading dot; the locator searches for these */
  readonly extensions: readonly string[];

  /**
   * Parse source code string
   * @throws ParseError on malformed input
   */
  parseCode(code: string, options?: { filePath?: string }): SyntaxTree;

  /**
   * Parse a file from disk
   * @param filePath - Absolute path to source file
   * @param rootPath - Checkout root, used for relative paths
   * @throws FileSystemError if the file can't be read
   * @throws ParseError on malformed input
   * @throws the cancellation error if `cancellationToken` was cancelled
   *   while the file was read
   */
  parseFile(filePath: string, rootPath: string, cancellationToken?: CancellationToken): Promise<ParsedSourceFile>;
}
