/**
 * Instruction set: a category of rules handed to agents.
 */
export interface Instructions {
  /** Category name, unique within a repository */
  category: string
  /** Rules in this category (at least one) */
  rules: string[]
}
