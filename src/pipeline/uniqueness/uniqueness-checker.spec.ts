import { UniquenessChecker, normalizeIdentity, UniqueLookup } from './uniqueness-checker';
import { DependencyUnavailableError } from '../../shared/persistence';

describe('UniquenessChecker', () => {
    const checker = new UniquenessChecker();

    /** Lookup backed by a map of already-normalized values */
    const lookupOver = (owners: Record<string, string>): UniqueLookup =>
        async (_field, value) => owners[value] ?? null;

    it('should report a free value as unique', async () => {
        await expect(checker.isUnique(lookupOver({}), 'email', 'jane@example.com')).resolves.toBe(true);
    });

    it('should report a taken value as not unique', async () => {
        const lookup = lookupOver({ 'jane@example.com': 'mem-1' });

        await expect(checker.isUnique(lookup, 'email', 'jane@example.com')).resolves.toBe(false);
    });

    it('should let the owner keep its own value', async () => {
        const lookup = lookupOver({ 'jane@example.com': 'mem-1' });

        await expect(checker.isUnique(lookup, 'email', 'jane@example.com', 'mem-1')).resolves.toBe(true);
        await expect(checker.isUnique(lookup, 'email', 'jane@example.com', 'mem-2')).resolves.toBe(false);
    });

    it.each(['Jane@Example.com', '  jane@example.com', 'JANE@EXAMPLE.COM  ', '\tjane@example.COM\n'])(
        'should treat %p as the stored identity after normalization',
        async (candidate) => {
            const lookup = lookupOver({ 'jane@example.com': 'mem-1' });

            expect(normalizeIdentity(candidate)).toBe('jane@example.com');
            await expect(checker.isUnique(lookup, 'email', normalizeIdentity(candidate))).resolves.toBe(false);
        },
    );

    it('should fail closed when the lookup throws', async () => {
        const lookup: UniqueLookup = jest.fn().mockRejectedValue(new Error('socket hang up'));

        await expect(checker.isUnique(lookup, 'email', 'jane@example.com'))
            .rejects.toBeInstanceOf(DependencyUnavailableError);
    });

    it('should pass through an existing dependency error', async () => {
        const original = new DependencyUnavailableError('dynamodb');
        const lookup: UniqueLookup = jest.fn().mockRejectedValue(original);

        await expect(checker.isUnique(lookup, 'email', 'jane@example.com')).rejects.toBe(original);
    });
});
