/**
 * Raised for mistakes in a menu tree or handler table.
 * These are authoring bugs, never caused by user input.
 */
export class MenuDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MenuDefinitionError';
  }
}
