import assert from 'node:assert/strict';
import test from 'node:test';
import { LOG_CONFIG } from '../src/config/env.ts';
import { Logger } from '../src/services/logger.ts';

test('the event buffer keeps only the newest events', () => {
    Logger.clear();
    Logger.setMaxEvents(3);
    try {
        for (let i = 1; i <= 5; i++) Logger.debug(`event.${i}`, { i });

        assert.deepEqual(
            Logger.getEvents().map((event) => event.type),
            ['event.3', 'event.4', 'event.5'],
        );
    } finally {
        Logger.setMaxEvents(LOG_CONFIG.MAX_EVENTS);
        Logger.clear();
    }
});

test('lowering the cap drops the oldest recorded events', () => {
    Logger.clear();
    try {
        Logger.debug('first');
        Logger.debug('second');
        Logger.setMaxEvents(1);

        assert.deepEqual(
            Logger.getEvents().map((event) => [event.type, event.severity]),
            [['second', 'debug']],
        );
    } finally {
        Logger.setMaxEvents(LOG_CONFIG.MAX_EVENTS);
        Logger.clear();
    }
});
