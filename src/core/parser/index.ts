/**
 * Erlang Parser Module
 *
 * Tokenizes and parses Erlang source files into syntax trees.
 *
 * @module
 */

import * as path from "node:path";
import type { IParser, ParsedSourceFile } from "../interfaces/IParser.js";
import { NEVER_CANCELLED, type CancellationToken } from "../../utils/async.js";
import { getRelativePath, readFileWithEncoding } from "../../utils/fs.js";
import { FileSystemError, ParseError } from "../errors.js";
import type { SyntaxTree } from "./ast.js";
import { ErlangParser } from "./erlang-parser.js";
import { tokenize } from "./lexer.js";

export type * from "./ast.js";
export * from "./tokens.js";
export { Lexer, tokenize } from "./lexer.js";
export { ErlangParser, type ParsedForms } from "./erlang-parser.js";
export { toPattern, literalValue, stringValue } from "./patterns.js";

export interface ParseOptions {
  /** Attached to parse errors */
  filePath?: string;
}

/**
 * Parses Erlang source text into a syntax tree.
 *
 * @throws ParseError with the file path, line and column of the failure
 */
export function parseSource(source: string, options: ParseOptions = {}): SyntaxTree {
  try {
    const tokens = tokenize(source);
    const forms = new ErlangParser(tokens).parse();
    return { ...forms, tokens, source };
  } catch (error) {
    if (error instanceof ParseError && options.filePath !== undefined) {
      throw error.withFile(options.filePath);
    }
    throw error;
  }
}

/**
 * Module name of a parsed file: the `-module` attribute, or the file's base
 * name when the attribute is missing.
 */
export function resolveModuleName(tree: SyntaxTree, filePath: string): string {
  return tree.module ?? path.basename(filePath, path.extname(filePath));
}

/**
 * File-level parser for Erlang sources.
 *
 * @example
 * ```typescript
 * const parser = new ErlangSourceParser();
 * const { file, tree } = await parser.parseFile("/repo/src/stack.erl", "/repo");
 * console.log(file.module, tree.functions.length);
 * ```
 */
export class ErlangSourceParser implements IParser {
  readonly extensions: readonly string[];

  constructor(extensions: readonly string[] = [".erl"]) {
    this.extensions = extensions;
  }

  parseCode(code: string, options: ParseOptions = {}): SyntaxTree {
    return parseSource(code, options);
  }

  async parseFile(
    filePath: string,
    rootPath: string,
    cancellationToken: CancellationToken = NEVER_CANCELLED
  ): Promise<ParsedSourceFile> {
    const relativePath = getRelativePath(filePath, rootPath);

    let content: string;
    try {
      content = await readFileWithEncoding(filePath);
    } catch (error) {
      throw new FileSystemError(
        `Cannot read ${relativePath}: ${error instanceof Error ? error.message : String(error)}`,
        { filePath: relativePath }
      );
    }

    // Parsing is synchronous, so a timeout can only land while the file is read
    cancellationToken.throwIfCancelled();
    const tree = parseSource(content, { filePath: relativePath });
    return {
      file: {
        path: filePath,
        relativePath,
        content,
        module: resolveModuleName(tree, filePath),
      },
      tree,
    };
  }
}
