/**
 * @fileoverview Field Validator
 *
 * Pure syntactic validation of request fields against {@link FIELD_RULES}.
 *
 * @remarks
 * Message format:
 * - Missing or blank value: `<Label> is required`
 * - Otherwise every violated rule contributes one fragment:
 *   `<Label> <fragment>, <fragment>`
 *
 * {@link FieldValidator.validateAll} checks every field and never stops at the
 * first failure.
 */

import { Injectable } from '@nestjs/common';
import { FIELD_RULES, FieldRuleName, FieldRuleSet, ListRuleSet, StringRuleSet } from './field-rules';

export interface ValidationResult {
    valid: boolean;
    errorMessage?: string;
}

/** One field of a composite request */
export interface FieldInput {
    value: unknown;
    rules: FieldRuleName;
}

/** Field name to message, empty when the request is valid */
export type FieldErrors = Record<string, string>;

const VALID: ValidationResult = { valid: true };

function invalid(label: string, fragments: string[]): ValidationResult {
    return { valid: false, errorMessage: `${label} ${fragments.join(', ')}` };
}

function collect<T>(rules: ((value: T) => string | null)[], value: T): string[] {
    const fragments: string[] = [];
    for (const rule of rules) {
        const fragment = rule(value);
        if (fragment !== null) fragments.push(fragment);
    }
    return fragments;
}

function validateString(ruleSet: StringRuleSet, rawValue: unknown): ValidationResult {
    if (rawValue === undefined || rawValue === null) {
        return ruleSet.optional ? VALID : invalid(ruleSet.label, ['is required']);
    }
    if (typeof rawValue !== 'string') {
        return invalid(ruleSet.label, ['must be a string']);
    }
    if (rawValue.trim().length === 0) {
        return ruleSet.optional ? VALID : invalid(ruleSet.label, ['is required']);
    }

    const value = ruleSet.trim ? rawValue.trim() : rawValue;
    const fragments = collect(ruleSet.rules, value);
    return fragments.length === 0 ? VALID : invalid(ruleSet.label, fragments);
}

function validateList(ruleSet: ListRuleSet, rawValue: unknown): ValidationResult {
    if (rawValue === undefined || rawValue === null) {
        return invalid(ruleSet.label, ['is required']);
    }
    if (!Array.isArray(rawValue) || !rawValue.every((item): item is string => typeof item === 'string')) {
        return invalid(ruleSet.label, ['must be a list of strings']);
    }
    if (rawValue.length < ruleSet.minItems) {
        return invalid(ruleSet.label, [`must contain at least ${ruleSet.minItems} item(s)`]);
    }

    const fragments = collect(ruleSet.rules, rawValue);
    return fragments.length === 0 ? VALID : invalid(ruleSet.label, fragments);
}

@Injectable()
export class FieldValidator {
    validate(fieldName: string, rawValue: unknown, ruleSet: FieldRuleSet): ValidationResult {
        switch (ruleSet.kind) {
            case 'string':
                return validateString(ruleSet, rawValue);
            case 'list':
                return validateList(ruleSet, rawValue);
        }
    }

    /**
     * Validates every field of a request.
     *
     * @returns Messages keyed by field name; empty when all fields pass
     */
    validateAll(fields: Record<string, FieldInput>): FieldErrors {
        const errors: FieldErrors = {};
        for (const [fieldName, input] of Object.entries(fields)) {
            const ruleSet: FieldRuleSet = FIELD_RULES[input.rules];
            const result = this.validate(fieldName, input.value, ruleSet);
            if (!result.valid && result.errorMessage) {
                errors[fieldName] = result.errorMessage;
            }
        }
        return errors;
    }
}

/**
 * Trimmed text of a raw request value; empty for anything but a string.
 * Invalid values never get past validation, so the draft built from this is
 * only persisted when the raw value was a valid string.
 */
export function textOf(rawValue: unknown): string {
    return typeof rawValue === 'string' ? rawValue.trim() : '';
}
