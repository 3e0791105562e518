/**
 * Documentation standard types.
 */

export type RequirementLevel = 'must' | 'should' | 'may' | 'recommended' | 'optional'

export interface StandardScope {
  /** ISO 639-1 codes */
  languages: string[]
  appliesTo?: string[]
  notApplicableTo?: string[]
}

export interface StandardRelations {
  /** URLs of related standards */
  standard?: string[]
}

export interface StandardMetadata {
  /** kebab-case */
  id: string
  name: string
  version: string
  tags: string[]
  scope: StandardScope
  relations?: StandardRelations
}

export interface StandardSpecification {
  purpose: string
  goals: string[]
  nonGoals?: string[]
}

export interface FieldDefinition {
  fieldName: string
}

export interface TermDefinition {
  abbreviation: string
  term: string
  meaning: string
}

export interface StandardDefinitions {
  fields?: FieldDefinition[]
  terms?: TermDefinition[]
}

export interface RequirementException {
  when: string
}

export interface RequirementVerificationMethod {
  type: string
  hint: string
}

export interface RequirementRule {
  level: RequirementLevel
  statement: string
  rationale: string
  exceptions?: RequirementException[]
  verificationMethod?: RequirementVerificationMethod[]
}

export interface StandardRequirements {
  rules: RequirementRule[]
}

export interface GoldenPathExampleFile {
  path: string
  snippet: string
}

export interface GoldenPathExample {
  name: string
  when?: string[]
  steps: string[]
  examples?: GoldenPathExampleFile[]
}

export interface GoldenPath {
  steps: string[]
  examples?: GoldenPathExample[]
}

export interface StandardExample {
  title: string
  language: string
  snippet: string
  reason: string
}

export interface StandardExamples {
  good: StandardExample[]
  bad?: StandardExample[]
}

export interface StandardReference {
  title: string
  type: string
  uri: string
}

export interface Standard {
  metadata: StandardMetadata
  specification: StandardSpecification
  definitions?: StandardDefinitions
  requirements: StandardRequirements
  goldenPath?: GoldenPath
  examples: StandardExamples
  references?: StandardReference[]
}
