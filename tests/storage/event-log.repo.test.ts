import Database from 'better-sqlite3';
import { migrate } from '../../src/storage/migrations.js';
import { EventLogRepository } from '../../src/storage/event-log.repo.js';
import { FIXED_TIMESTAMP, FIXED_TIMESTAMP_2 } from '../fixtures.js';

describe('EventLogRepository', () => {
    let db: Database.Database;
    let repo: EventLogRepository;

    beforeEach(() => {
        db = new Database(':memory:');
        migrate(db);
        repo = new EventLogRepository(db);
    });

    afterEach(() => {
        db.close();
    });

    it('should append events and read them back by type', () => {
        const id = repo.append('kinematics', { operation: 'set_value', target: 'x.t' }, FIXED_TIMESTAMP);

        expect(id).toBe(1);
        expect(repo.findByType('kinematics')).toEqual([{
            id: 1,
            type: 'kinematics',
            payload: { operation: 'set_value', target: 'x.t' },
            timestamp: FIXED_TIMESTAMP
        }]);
    });

    it('should return the newest events first', () => {
        repo.append('kinematics', { n: 1 }, FIXED_TIMESTAMP);
        repo.append('kinematics', { n: 2 }, FIXED_TIMESTAMP_2);
        repo.append('other', { n: 3 }, FIXED_TIMESTAMP_2);

        expect(repo.findByType('kinematics').map(event => event.payload)).toEqual([{ n: 2 }, { n: 1 }]);
        expect(repo.findByType('kinematics', 1)).toHaveLength(1);
    });
});
