/**
 * @fileoverview Local JWT Token Generator
 *
 * Generates JWT tokens for the accounts created by the seed script.
 *
 * @remarks
 * Usage:
 * ```bash
 * npm run token:admin    # ADMIN role
 * npm run token:user     # USER role
 * npm run token:viewer   # VIEWER role
 * ```
 *
 * The API loads the account and its roles on every request, so a token only
 * works while the seeded account exists and is enabled.
 */

import * as jwt from 'jsonwebtoken';

/* -------------------------------------------------------------------------- */
/*                              Configuration                                  */
/* -------------------------------------------------------------------------- */

/** Local development secret - NEVER use in production */
const LOCAL_SECRET = process.env.JWT_SECRET || 'local-dev-secret-do-not-use-in-prod';

/** Local mock issuer URL */
const ISSUER = 'http://localhost:3000';

/* -------------------------------------------------------------------------- */
/*                              Token Configurations                           */
/* -------------------------------------------------------------------------- */

interface TokenConfig {
    sub: string;
    username: string;
    /** Seconds */
    expiresIn: number;
}

/**
 * One persona per seeded account.
 */
const tokenConfigs: Record<string, TokenConfig> = {
    admin: {
        sub: 'user-admin',
        username: 'admin',
        expiresIn: 24 * 60 * 60,
    },

    user: {
        sub: 'user-demo',
        username: 'demo',
        expiresIn: 24 * 60 * 60,
    },

    viewer: {
        sub: 'user-viewer',
        username: 'viewer',
        expiresIn: 24 * 60 * 60,
    },
};

/* -------------------------------------------------------------------------- */
/*                              Token Generation                               */
/* -------------------------------------------------------------------------- */

/**
 * Generates a signed JWT token for the specified role.
 *
 * @param role - One of: admin, user, viewer
 * @returns Signed JWT token string
 */
function generateToken(role: string): string {
    const config = tokenConfigs[role];

    if (!config) {
        console.error(`Unknown role: ${role}`);
        console.error(`Available roles: ${Object.keys(tokenConfigs).join(', ')}`);
        process.exit(1);
    }

    const payload = {
        sub: config.sub,
        username: config.username,
        iat: Math.floor(Date.now() / 1000),
    };

    const token = jwt.sign(payload, LOCAL_SECRET, {
        issuer: ISSUER,
        expiresIn: config.expiresIn,
    });

    return token;
}

/* -------------------------------------------------------------------------- */
/*                              Main Entrypoint                                */
/* -------------------------------------------------------------------------- */

const role = process.argv[2] || 'admin';
const token = generateToken(role);

// Output only the token (for use in shell scripts)
console.log(token);
