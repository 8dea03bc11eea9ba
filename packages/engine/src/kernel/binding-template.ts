import type { PropertyValue } from './property-value.js';

type BindingMap = Readonly<Record<string, PropertyValue | undefined>>;

const toKeyPart = (value: PropertyValue | undefined): string | null => {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
};

/** Replaces `{name}` with the scalar bound to `name`; unresolved placeholders are kept verbatim. */
export const resolveBindingTemplate = (template: string, bindings: BindingMap): string =>
  template.replace(/\{([^{}]+)\}/g, (match, rawName: string) => {
    const name = rawName.trim();
    if (!Object.hasOwn(bindings, name)) {
      return match;
    }
    return toKeyPart(bindings[name]) ?? match;
  });

export const hasUnresolvedPlaceholder = (text: string): boolean => /\{[^{}]+\}/.test(text);
