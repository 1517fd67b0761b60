/**
 * @fileoverview Field Rule Tables
 *
 * Declarative rule sets for every validated field. A rule returns the error
 * fragment it contributes, or null when satisfied; fragments are later
 * joined behind the field label.
 */

import { unknownPermissions } from '../authorization/permission';

export type FieldRule<T> = (value: T) => string | null;

/** Rules for a single string value */
export interface StringRuleSet {
    kind: 'string';
    label: string;
    /** Blank values pass instead of failing with "is required" */
    optional?: boolean;
    /** Trim before the rules run (passwords are checked verbatim) */
    trim: boolean;
    rules: FieldRule<string>[];
}

/** Rules for a list of strings */
export interface ListRuleSet {
    kind: 'list';
    label: string;
    minItems: number;
    rules: FieldRule<string[]>[];
}

export type FieldRuleSet = StringRuleSet | ListRuleSet;

/** Symbols accepted by the password policy */
export const PASSWORD_SYMBOLS = '!@#$%^&*()_+-=[]{}|;:,.<>?';

// local@domain with dot-separated labels and an alphabetic TLD
const EMAIL_PATTERN = /^[a-zA-Z0-9_+&*-]+(?:\.[a-zA-Z0-9_+&*-]+)*@(?:[a-zA-Z0-9-]+\.)+[a-zA-Z]{2,7}$/;
const DIGIT = /\d/;
const DIGITS_ONLY = /^\d*$/;
const WHITESPACE = /\s/;
const ROLE_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

const lengthBetween = (min: number, max: number): FieldRule<string> =>
    (value) => (value.length >= min && value.length <= max
        ? null
        : `must be between ${min} and ${max} characters`);

const maxLength = (max: number): FieldRule<string> =>
    (value) => (value.length <= max ? null : `must not exceed ${max} characters`);

const requires = (pattern: RegExp, fragment: string): FieldRule<string> =>
    (value) => (pattern.test(value) ? null : fragment);

const forbids = (pattern: RegExp, fragment: string): FieldRule<string> =>
    (value) => (pattern.test(value) ? fragment : null);

export const FIELD_RULES = {
    name: {
        kind: 'string',
        label: 'Name',
        trim: true,
        rules: [
            lengthBetween(1, 25),
            forbids(DIGIT, 'must not contain numbers'),
        ],
    },
    email: {
        kind: 'string',
        label: 'Email',
        trim: true,
        rules: [
            requires(EMAIL_PATTERN, 'must be a valid email address'),
            maxLength(254),
        ],
    },
    phoneNumber: {
        kind: 'string',
        label: 'Phone number',
        trim: true,
        rules: [
            requires(DIGITS_ONLY, 'must contain only digits'),
            (value) => (value.length === 10 ? null : 'must be exactly 10 digits'),
            requires(/^[6-9]/, 'must start with 6, 7, 8 or 9'),
        ],
    },
    username: {
        kind: 'string',
        label: 'Username',
        trim: true,
        rules: [lengthBetween(3, 50)],
    },
    password: {
        kind: 'string',
        label: 'Password',
        trim: false,
        rules: [
            (value) => (value.length >= 8 ? null : 'must be at least 8 characters'),
            requires(/[A-Z]/, 'must contain at least one uppercase letter'),
            requires(/[a-z]/, 'must contain at least one lowercase letter'),
            requires(DIGIT, 'must contain at least one number'),
            (value) => ([...value].some((char) => PASSWORD_SYMBOLS.includes(char))
                ? null
                : `must contain at least one special character (${PASSWORD_SYMBOLS})`),
            forbids(WHITESPACE, 'must not contain whitespace'),
        ],
    },
    currentPassword: {
        kind: 'string',
        label: 'Current password',
        trim: false,
        rules: [],
    },
    roleName: {
        kind: 'string',
        label: 'Role name',
        trim: true,
        rules: [
            lengthBetween(2, 50),
            requires(ROLE_NAME_PATTERN, 'must contain only letters, digits and underscores'),
        ],
    },
    description: {
        kind: 'string',
        label: 'Description',
        optional: true,
        trim: true,
        rules: [maxLength(255)],
    },
    permissions: {
        kind: 'list',
        label: 'Permissions',
        minItems: 0,
        rules: [
            (tokens) => {
                const unknown = unknownPermissions(tokens);
                return unknown.length === 0 ? null : `contain unknown values: ${unknown.join(', ')}`;
            },
        ],
    },
    roleIds: {
        kind: 'list',
        label: 'Role ids',
        minItems: 1,
        rules: [
            (ids) => (ids.every((id) => id.trim().length > 0) ? null : 'must not contain blank values'),
        ],
    },
} satisfies Record<string, FieldRuleSet>;

export type FieldRuleName = keyof typeof FIELD_RULES;
