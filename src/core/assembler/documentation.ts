/**
 * Documentation providers.
 *
 * @module
 */

import type { IDocumentationProvider } from "../interfaces/IDocumentationProvider.js";
import { ConfigurationError } from "../errors.js";
import { readJson } from "../../utils/index.js";
import {
  DocumentationMapSchema,
  formatZodError,
  safeValidate,
  type DocumentationMap,
} from "../../utils/validation.js";

export function documentationKey(module: string, name: string, arity: number): string {
  return `${module}:${name}/${arity}`;
}

/**
 * Provider with no documentation; every record gets an empty doc string.
 */
export class EmptyDocumentationProvider implements IDocumentationProvider {
  getDocumentation(): string | undefined {
    return undefined;
  }
}

/**
 * Provider backed by a `{"module:name/arity": "doc"}` map.
 *
 * @example
 * ```typescript
 * const docs = JsonDocumentationProvider.fromFile("docs.json");
 * docs.getDocumentation("lists", "reverse", 1);
 * ```
 */
export class JsonDocumentationProvider implements IDocumentationProvider {
  private readonly docs: ReadonlyMap<string, string>;

  constructor(docs: DocumentationMap) {
    this.docs = new Map(Object.entries(docs));
  }

  /**
   * @throws ConfigurationError if the file is unreadable or not a valid map
   */
  static fromFile(filePath: string): JsonDocumentationProvider {
    let raw: unknown;
    try {
      raw = readJson(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Cannot read documentation file ${filePath}: ${message}`, [message]);
    }

    const result = safeValidate(DocumentationMapSchema, raw);
    if (!result.success) {
      const issues = formatZodError(result.error);
      throw new ConfigurationError(`Invalid documentation file ${filePath}`, issues);
    }
    return new JsonDocumentationProvider(result.data);
  }

  getDocumentation(module: string, name: string, arity: number): string | undefined {
    return this.docs.get(documentationKey(module, name, arity));
  }
}
