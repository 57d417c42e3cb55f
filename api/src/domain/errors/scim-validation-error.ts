/**
 * Domain-layer SCIM validation errors.
 *
 * Thrown by the schema engine when a resource or PATCH request is invalid.
 * Services catch this and convert to framework-specific HTTP errors.
 *
 * Every constructor below builds a fresh error per call; there are no shared
 * error instances to mutate.
 *
 * @see RFC 7644 §3.12 — HTTP Status and Error Response Handling
 */

// ─── Taxonomy ────────────────────────────────────────────────────────────────

export enum ScimErrorKind {
  InvalidSyntax = 'InvalidSyntax',
  InvalidValue = 'InvalidValue',
  InvalidPath = 'InvalidPath',
  InvalidFilter = 'InvalidFilter',
  Mutability = 'Mutability',
  DuplicateAttributeFound = 'DuplicateAttributeFound',
}

interface ErrorTemplate {
  scimType: string;
  status: number;
  detail: string;
}

/** RFC 7644 Table 9 detail texts, keyed by error kind */
const ERROR_TEMPLATES: Readonly<Record<ScimErrorKind, ErrorTemplate>> = {
  [ScimErrorKind.InvalidSyntax]: {
    scimType: 'invalidSyntax',
    status: 400,
    detail: 'The request body message structure was invalid or did not conform to the request schema.',
  },
  [ScimErrorKind.InvalidValue]: {
    scimType: 'invalidValue',
    status: 400,
    detail: 'A required value was missing, or the value specified was not compatible with the operation or attribute type, or resource schema.',
  },
  [ScimErrorKind.InvalidPath]: {
    scimType: 'invalidPath',
    status: 400,
    detail: 'The "path" attribute was invalid or malformed.',
  },
  [ScimErrorKind.InvalidFilter]: {
    scimType: 'invalidFilter',
    status: 400,
    detail: 'The specified filter syntax was invalid, or the specified attribute and filter comparison combination is not supported.',
  },
  [ScimErrorKind.Mutability]: {
    scimType: 'mutability',
    status: 400,
    detail: 'The attempted modification is not compatible with the target attribute\'s mutability or current state.',
  },
  [ScimErrorKind.DuplicateAttributeFound]: {
    scimType: 'invalidValue',
    status: 400,
    detail: 'Duplicate attribute found in the request.',
  },
};

/** Wire shape of a SCIM error (status as integer) */
export interface ScimErrorObject {
  scimType: string;
  detail: string;
  status: number;
}

export class ScimValidationError extends Error {
  public readonly kind: ScimErrorKind;
  public readonly status: number;
  public readonly scimType: string;

  constructor(kind: ScimErrorKind, detail: string) {
    super(detail);
    this.name = 'ScimValidationError';
    this.kind = kind;
    this.status = ERROR_TEMPLATES[kind].status;
    this.scimType = ERROR_TEMPLATES[kind].scimType;
  }

  get detail(): string {
    return this.message;
  }

  toJSON(): ScimErrorObject {
    return { scimType: this.scimType, detail: this.message, status: this.status };
  }
}

// ─── Constructors ────────────────────────────────────────────────────────────

function build(kind: ScimErrorKind, suffix?: string): ScimValidationError {
  const base = ERROR_TEMPLATES[kind].detail;
  return new ScimValidationError(kind, suffix ? `${base} ${suffix}` : base);
}

export function invalidSyntax(suffix?: string): ScimValidationError {
  return build(ScimErrorKind.InvalidSyntax, suffix);
}

export function invalidValue(suffix?: string): ScimValidationError {
  return build(ScimErrorKind.InvalidValue, suffix);
}

export function invalidPath(suffix?: string): ScimValidationError {
  return build(ScimErrorKind.InvalidPath, suffix);
}

export function invalidFilter(suffix?: string): ScimValidationError {
  return build(ScimErrorKind.InvalidFilter, suffix);
}

export function mutabilityViolation(attributeName: string): ScimValidationError {
  return build(ScimErrorKind.Mutability, `Attribute name: ${attributeName}`);
}

export function duplicateAttribute(attributeName: string): ScimValidationError {
  return build(ScimErrorKind.DuplicateAttributeFound, `Attribute name: ${attributeName}`);
}

/** Invalid value error naming the offending attribute */
export function invalidAttributeValue(reason: string, attributeName: string): ScimValidationError {
  return build(ScimErrorKind.InvalidValue, `${reason} Attribute name: ${attributeName}`);
}
