/**
 * @fileoverview Field Validator Tests
 */

import { FieldValidator } from './field-validator';
import { FIELD_RULES } from './field-rules';

describe('FieldValidator', () => {
    const validator = new FieldValidator();

    describe('name', () => {
        it('should accept a plain name', () => {
            expect(validator.validate('name', 'Jane Doe', FIELD_RULES.name)).toEqual({ valid: true });
        });

        it.each(['Jane123', '1', 'R2D2', 'Agent 47', 'x9'])('should reject %p as containing numbers', (value) => {
            const result = validator.validate('name', value, FIELD_RULES.name);

            expect(result.valid).toBe(false);
            expect(result.errorMessage).toContain('numbers');
        });

        it('should report both length and digits', () => {
            const result = validator.validate('name', 'Abcdefghijklmnopqrstuvwxy9', FIELD_RULES.name);

            expect(result.errorMessage).toBe('Name must be between 1 and 25 characters, must not contain numbers');
        });

        it('should treat whitespace as missing', () => {
            expect(validator.validate('name', '   ', FIELD_RULES.name)).toEqual({
                valid: false,
                errorMessage: 'Name is required',
            });
        });

        it('should check the trimmed value', () => {
            expect(validator.validate('name', '  Jane  ', FIELD_RULES.name).valid).toBe(true);
        });

        it('should reject non-string values', () => {
            expect(validator.validate('name', 42, FIELD_RULES.name).errorMessage).toBe('Name must be a string');
        });
    });

    describe('email', () => {
        it.each(['jane@example.com', 'first.last+tag@mail.example.org', 'a_b@x-y.io'])('should accept %p', (value) => {
            expect(validator.validate('email', value, FIELD_RULES.email).valid).toBe(true);
        });

        it.each(['jane', 'jane@', '@example.com', 'jane@example', 'jane@@example.com', 'jane@example.c0m'])(
            'should reject %p',
            (value) => {
                expect(validator.validate('email', value, FIELD_RULES.email).errorMessage)
                    .toBe('Email must be a valid email address');
            },
        );

        it('should reject addresses over 254 characters', () => {
            const value = `${'a'.repeat(250)}@example.com`;

            expect(validator.validate('email', value, FIELD_RULES.email).errorMessage)
                .toBe('Email must not exceed 254 characters');
        });
    });

    describe('phoneNumber', () => {
        it('should accept ten digits starting with 6-9', () => {
            for (const value of ['9876543210', '6000000000', '7123456789', '8999999999']) {
                expect(validator.validate('phoneNumber', value, FIELD_RULES.phoneNumber).valid).toBe(true);
            }
        });

        it('should accept surrounding whitespace', () => {
            expect(validator.validate('phoneNumber', ' 9876543210 ', FIELD_RULES.phoneNumber).valid).toBe(true);
        });

        it.each([
            '5876543210',
            '0876543210',
            '987654321',
            '98765432100',
            '98765-43210',
            '+919876543',
            '98765 4321',
            'abcdefghij',
        ])('should reject %p', (value) => {
            expect(/^[6-9]\d{9}$/.test(value)).toBe(false);
            expect(validator.validate('phoneNumber', value, FIELD_RULES.phoneNumber).valid).toBe(false);
        });

        it('should enumerate every violated rule', () => {
            expect(validator.validate('phoneNumber', '12345', FIELD_RULES.phoneNumber).errorMessage)
                .toBe('Phone number must be exactly 10 digits, must start with 6, 7, 8 or 9');
        });

        it('should flag letters in a ten character value', () => {
            expect(validator.validate('phoneNumber', '98765abcde', FIELD_RULES.phoneNumber).errorMessage)
                .toBe('Phone number must contain only digits');
        });
    });

    describe('username', () => {
        it('should enforce 3-50 characters', () => {
            expect(validator.validate('username', 'jd', FIELD_RULES.username).errorMessage)
                .toBe('Username must be between 3 and 50 characters');
            expect(validator.validate('username', 'jdoe', FIELD_RULES.username).valid).toBe(true);
            expect(validator.validate('username', 'j'.repeat(51), FIELD_RULES.username).valid).toBe(false);
        });
    });

    describe('password', () => {
        it('should accept a compliant password', () => {
            expect(validator.validate('password', 'Str0ng!Pass', FIELD_RULES.password)).toEqual({ valid: true });
        });

        it.each([
            ['str0ng!pass', 'Password must contain at least one uppercase letter'],
            ['STR0NG!PASS', 'Password must contain at least one lowercase letter'],
            ['Strong!Pass', 'Password must contain at least one number'],
            ['Str0ngPass', 'Password must contain at least one special character (!@#$%^&*()_+-=[]{}|;:,.<>?)'],
        ])('should name exactly the missing category for %p', (value, message) => {
            expect(validator.validate('password', value, FIELD_RULES.password).errorMessage).toBe(message);
        });

        it('should enumerate several missing categories in order', () => {
            expect(validator.validate('password', 'alllowercase', FIELD_RULES.password).errorMessage).toBe(
                'Password must contain at least one uppercase letter, must contain at least one number, '
                + 'must contain at least one special character (!@#$%^&*()_+-=[]{}|;:,.<>?)',
            );
        });

        it('should reject whitespace and short values', () => {
            expect(validator.validate('password', 'Ab1! x', FIELD_RULES.password).errorMessage)
                .toBe('Password must be at least 8 characters, must not contain whitespace');
        });

        it('should not trim passwords', () => {
            expect(validator.validate('password', ' Str0ng!Pass', FIELD_RULES.password).errorMessage)
                .toBe('Password must not contain whitespace');
        });

        it('should require a value', () => {
            expect(validator.validate('password', '', FIELD_RULES.password).errorMessage).toBe('Password is required');
        });
    });

    describe('roles', () => {
        it('should validate role names', () => {
            expect(validator.validate('name', 'AUDITOR', FIELD_RULES.roleName).valid).toBe(true);
            expect(validator.validate('name', 'bad name', FIELD_RULES.roleName).errorMessage)
                .toBe('Role name must contain only letters, digits and underscores');
        });

        it('should allow a missing description', () => {
            expect(validator.validate('description', undefined, FIELD_RULES.description).valid).toBe(true);
        });

        it('should reject unknown permission tokens', () => {
            expect(validator.validate('permissions', ['member:read', 'member:purge'], FIELD_RULES.permissions).errorMessage)
                .toBe('Permissions contain unknown values: member:purge');
        });

        it('should reject non-string list entries', () => {
            expect(validator.validate('permissions', ['member:read', 3], FIELD_RULES.permissions).errorMessage)
                .toBe('Permissions must be a list of strings');
        });

        it('should require at least one role id', () => {
            expect(validator.validate('roleIds', [], FIELD_RULES.roleIds).errorMessage)
                .toBe('Role ids must contain at least 1 item(s)');
        });
    });

    describe('validateAll', () => {
        it('should return an empty map for a valid request', () => {
            const errors = validator.validateAll({
                name: { value: 'Jane Doe', rules: 'name' },
                email: { value: 'jane@example.com', rules: 'email' },
                phoneNumber: { value: '9876543210', rules: 'phoneNumber' },
            });

            expect(errors).toEqual({});
        });

        it('should report every invalid field at once', () => {
            const errors = validator.validateAll({
                name: { value: 'Jane123', rules: 'name' },
                email: { value: 'not-an-email', rules: 'email' },
                phoneNumber: { value: '9876543210', rules: 'phoneNumber' },
                password: { value: undefined, rules: 'password' },
            });

            expect(errors).toEqual({
                name: 'Name must not contain numbers',
                email: 'Email must be a valid email address',
                password: 'Password is required',
            });
        });
    });
});
