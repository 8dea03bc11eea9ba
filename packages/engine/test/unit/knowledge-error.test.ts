import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  definitionInvalidError,
  duplicateInstanceError,
  isKnowledgeError,
  isKnowledgeErrorCode,
  KnowledgeError,
  targetMissingError,
  unknownDefinitionError,
  unknownPropertyError,
  unknownVerbError,
  valueTypeMismatchError,
} from '../../src/kernel/index.js';

describe('knowledge errors', () => {
  it('carry a code, a message and structured context', () => {
    const error = unknownPropertyError('Card', 'colour', ['name', 'zone']);
    assert.ok(error instanceof KnowledgeError);
    assert.ok(error instanceof Error);
    assert.equal(error.name, 'KnowledgeError');
    assert.equal(error.code, 'UNKNOWN_PROPERTY');
    assert.equal(error.message, "Property 'colour' does not exist in class 'Card'");
    assert.deepEqual(error.context, { className: 'Card', property: 'colour', availableProperties: ['name', 'zone'] });
  });

  it('format each code', () => {
    assert.equal(unknownDefinitionError('Card_X').message, 'No definition found for class: Card_X');
    assert.equal(unknownVerbError('Scry').message, 'No verb registered under name: Scry');
    assert.equal(
      duplicateInstanceError('card_1', 'Card').message,
      "Instance id 'card_1' is already registered (class 'Card')",
    );
    assert.equal(targetMissingError('Tap', 0, 0).message, "Verb 'Tap' has no target bound at index 0");
    assert.equal(definitionInvalidError('Card', 'no name').message, "Definition 'Card' is invalid: no name");
  });

  it('omit available class names unless given', () => {
    assert.deepEqual(unknownDefinitionError('X').context, { className: 'X' });
    assert.deepEqual(unknownDefinitionError('X', ['Card']).context, { className: 'X', availableClassNames: ['Card'] });
  });

  it('describe the actual type of a mismatched value', () => {
    assert.equal(valueTypeMismatchError('SetLife', 'value', 'a number', null).context.actualType, 'null');
    assert.equal(valueTypeMismatchError('SetLife', 'value', 'a number', [1]).context.actualType, 'array');
    assert.equal(valueTypeMismatchError('SetLife', 'value', 'a number', 'x').context.actualType, 'string');
    assert.equal(
      valueTypeMismatchError('SetLife', 'value', 'a number', 'x').message,
      "Verb 'SetLife' value must evaluate to a number",
    );
  });

  it('are recognised by the guards', () => {
    const error = unknownVerbError('Scry');
    assert.equal(isKnowledgeError(error), true);
    assert.equal(isKnowledgeError(new Error('plain')), false);
    assert.equal(isKnowledgeErrorCode(error, 'UNKNOWN_VERB'), true);
    assert.equal(isKnowledgeErrorCode(error, 'UNKNOWN_PROPERTY'), false);
  });
});
