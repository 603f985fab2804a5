/**
 * Statement category checks
 *
 * Tools advertise the statements they accept; the only enforcement is a
 * prefix check on the trimmed, upper-cased text.
 */

import { ValidationError } from '../types/index.js';

/**
 * Throws ValidationError unless `sql` starts with one of `prefixes`
 */
export function assertStatementPrefix(
    sql: string,
    prefixes: readonly string[],
    message: string
): void {
    const statement = sql.trim().toUpperCase();
    if (!prefixes.some(prefix => statement.startsWith(prefix))) {
        throw new ValidationError(message, { allowed: [...prefixes] });
    }
}
