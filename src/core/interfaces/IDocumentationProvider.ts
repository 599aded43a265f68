/**
 * IDocumentationProvider - Documentation strings for functions
 *
 * Documentation extraction happens outside this project; providers only look
 * up what was extracted.
 *
 * @module
 */

export interface IDocumentationProvider {
  /**
   * Documentation for a function, or undefined when none is known
   */
  getDocumentation(module: string, name: string, arity: number): string | undefined;
}
