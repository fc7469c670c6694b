import { expect } from 'chai';
import type { ExpiringKeyStore } from '@/services/token.blacklist.js';
import { MemoryTokenBlacklist, RedisTokenBlacklist } from '@/services/token.blacklist.js';

// records the commands RedisTokenBlacklist sends
class RecordingStore implements ExpiringKeyStore {
    commands: Array<{ key: string; value: string; seconds: number }> = [];

    async set(key: string, value: string, _secondsToken: 'EX', seconds: number) {
        this.commands.push({ key, value, seconds });
        return 'OK';
    }

    async exists(key: string) {
        return this.commands.some(command => command.key === key) ? 1 : 0;
    }
}

describe('MemoryTokenBlacklist', () => {
    const start = Date.parse('2024-06-01T12:00:00.000Z');
    let now: number;
    let blacklist: MemoryTokenBlacklist;

    beforeEach(() => {
        now = start;
        blacklist = new MemoryTokenBlacklist(() => now);
    });

    it('reports revoked ids until the token would have expired', async () => {
        await blacklist.revoke('jti-1', new Date(start + 60_000));

        expect(await blacklist.isRevoked('jti-1')).to.equal(true);
        expect(await blacklist.isRevoked('jti-2')).to.equal(false);

        now = start + 60_000;
        expect(await blacklist.isRevoked('jti-1')).to.equal(false);
        expect(blacklist.size).to.equal(0);
    });

    it('ignores tokens that have already expired', async () => {
        await blacklist.revoke('jti-old', new Date(start - 1));
        expect(blacklist.size).to.equal(0);
    });
});

describe('RedisTokenBlacklist', () => {
    it('stores the id with a ttl matching the token lifetime', async () => {
        const store = new RecordingStore();
        const blacklist = new RedisTokenBlacklist(store);

        await blacklist.revoke('abc', new Date(Date.now() + 90_000));

        expect(store.commands).to.deep.equal([{ key: 'blacklist:abc', value: '1', seconds: 90 }]);
        expect(await blacklist.isRevoked('abc')).to.equal(true);
        expect(await blacklist.isRevoked('xyz')).to.equal(false);
    });

    it('skips tokens that have already expired', async () => {
        const store = new RecordingStore();
        const blacklist = new RedisTokenBlacklist(store);

        await blacklist.revoke('abc', new Date(Date.now() - 1000));
        expect(store.commands).to.have.length(0);
    });
});
