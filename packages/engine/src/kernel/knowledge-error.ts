export type KnowledgeErrorCode =
  | 'UNKNOWN_DEFINITION'
  | 'UNKNOWN_PROPERTY'
  | 'UNKNOWN_VERB'
  | 'DOMAIN_VIOLATION'
  | 'MAP_PROPERTY_REQUIRED'
  | 'DEFINITION_INVALID'
  | 'DUPLICATE_INSTANCE'
  | 'TARGET_MISSING'
  | 'VALUE_TYPE_MISMATCH';

export interface KnowledgeErrorContextByCode {
  readonly UNKNOWN_DEFINITION: Readonly<{
    readonly className: string;
    readonly availableClassNames?: readonly string[];
  }>;
  readonly UNKNOWN_PROPERTY: Readonly<{
    readonly className: string;
    readonly property: string;
    readonly availableProperties: readonly string[];
  }>;
  readonly UNKNOWN_VERB: Readonly<{
    readonly verb: string;
  }>;
  readonly DOMAIN_VIOLATION: Readonly<{
    readonly property: string;
    readonly value: unknown;
    readonly domain: string;
  }>;
  readonly MAP_PROPERTY_REQUIRED: Readonly<{
    readonly property: string;
    readonly operation: 'put' | 'putAll' | 'removeKey' | 'clearMap' | 'path';
  }>;
  readonly DEFINITION_INVALID: Readonly<{
    readonly className: string;
    readonly detail: string;
  }>;
  readonly DUPLICATE_INSTANCE: Readonly<{
    readonly objectId: string;
    readonly existingClassName: string;
  }>;
  readonly TARGET_MISSING: Readonly<{
    readonly verb: string;
    readonly index: number;
    readonly targetCount: number;
  }>;
  readonly VALUE_TYPE_MISMATCH: Readonly<{
    readonly verb: string;
    readonly field: string;
    readonly expected: string;
    readonly actualType: string;
  }>;
}

export type KnowledgeErrorContext<C extends KnowledgeErrorCode = KnowledgeErrorCode> = KnowledgeErrorContextByCode[C];

export class KnowledgeError<C extends KnowledgeErrorCode = KnowledgeErrorCode> extends Error {
  readonly code: C;
  readonly context: KnowledgeErrorContext<C>;

  constructor(code: C, message: string, context: KnowledgeErrorContext<C>) {
    super(message);
    this.name = 'KnowledgeError';
    this.code = code;
    this.context = context;
  }
}

export function unknownDefinitionError(
  className: string,
  availableClassNames?: readonly string[],
): KnowledgeError<'UNKNOWN_DEFINITION'> {
  return new KnowledgeError('UNKNOWN_DEFINITION', `No definition found for class: ${className}`, {
    className,
    ...(availableClassNames === undefined ? {} : { availableClassNames }),
  });
}

export function unknownPropertyError(
  className: string,
  property: string,
  availableProperties: readonly string[],
): KnowledgeError<'UNKNOWN_PROPERTY'> {
  return new KnowledgeError(
    'UNKNOWN_PROPERTY',
    `Property '${property}' does not exist in class '${className}'`,
    { className, property, availableProperties },
  );
}

export function unknownVerbError(verb: string): KnowledgeError<'UNKNOWN_VERB'> {
  return new KnowledgeError('UNKNOWN_VERB', `No verb registered under name: ${verb}`, { verb });
}

export function domainViolationError(
  property: string,
  value: unknown,
  domain: string,
  renderedValue: string,
): KnowledgeError<'DOMAIN_VIOLATION'> {
  return new KnowledgeError(
    'DOMAIN_VIOLATION',
    `Value ${renderedValue} is not valid for property '${property}' (domain: ${domain})`,
    { property, value, domain },
  );
}

export function mapPropertyRequiredError(
  property: string,
  operation: KnowledgeErrorContext<'MAP_PROPERTY_REQUIRED'>['operation'],
): KnowledgeError<'MAP_PROPERTY_REQUIRED'> {
  return new KnowledgeError('MAP_PROPERTY_REQUIRED', `Property '${property}' is not map-backed; ${operation} is unavailable`, {
    property,
    operation,
  });
}

export function definitionInvalidError(className: string, detail: string): KnowledgeError<'DEFINITION_INVALID'> {
  return new KnowledgeError('DEFINITION_INVALID', `Definition '${className}' is invalid: ${detail}`, { className, detail });
}

export function duplicateInstanceError(objectId: string, existingClassName: string): KnowledgeError<'DUPLICATE_INSTANCE'> {
  return new KnowledgeError(
    'DUPLICATE_INSTANCE',
    `Instance id '${objectId}' is already registered (class '${existingClassName}')`,
    { objectId, existingClassName },
  );
}

export function targetMissingError(verb: string, index: number, targetCount: number): KnowledgeError<'TARGET_MISSING'> {
  return new KnowledgeError('TARGET_MISSING', `Verb '${verb}' has no target bound at index ${index}`, {
    verb,
    index,
    targetCount,
  });
}

export function valueTypeMismatchError(
  verb: string,
  field: string,
  expected: string,
  actual: unknown,
): KnowledgeError<'VALUE_TYPE_MISMATCH'> {
  const actualType = actual === null ? 'null' : Array.isArray(actual) ? 'array' : typeof actual;
  return new KnowledgeError('VALUE_TYPE_MISMATCH', `Verb '${verb}' ${field} must evaluate to ${expected}`, {
    verb,
    field,
    expected,
    actualType,
  });
}

export function isKnowledgeError(error: unknown): error is KnowledgeError {
  return error instanceof KnowledgeError;
}

export function isKnowledgeErrorCode<C extends KnowledgeErrorCode>(error: unknown, code: C): error is KnowledgeError<C> {
  return isKnowledgeError(error) && error.code === code;
}
