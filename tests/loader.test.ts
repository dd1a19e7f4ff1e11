import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadMessages, parseMessages } from '../src/parsers/messages.parser';
import { loadSessions, parseSessions } from '../src/parsers/sessions.parser';
import { mergeSessionSources } from '../src/parsers/session-merger';
import { detectSourceKind, discoverSourceFiles } from '../src/utils/file.utils';
import { fixturePath, makeSession } from './helpers';

const MESSAGE_HEADER = 'tenantID,contactID,messageID,sessionID,messageDirection,messageKey,messageValue,createdAt,updatedAt,messageChannel';

describe('message loading', () => {
    it('loads every well-formed row with no skips', async () => {
        const { rows, report } = await loadMessages(fixturePath('messages.csv'));

        expect(rows).toHaveLength(6);
        expect(report.status).toBe('loaded');
        expect(report.rows).toBe(6);
        expect(report.skipped).toBe(0);
        expect(report.warnings).toEqual([]);
        expect(rows[2].content).toBe('I have a problem, please help');
    });

    it('produces the same rows when reading in very small chunks', async () => {
        const { rows, report } = await loadMessages(fixturePath('messages.csv'), { chunkSize: 16 });

        expect(rows.map(m => m.messageId)).toEqual(['m1', 'm2', 'm3', 'm4', 'm5', 'm6']);
        expect(report.skipped).toBe(0);
    });

    it('records a missing file and continues with an empty table', async () => {
        const missing = path.join(os.tmpdir(), 'no-such-dir', 'messages.csv');
        const { rows, report } = await loadMessages(missing);

        expect(rows).toEqual([]);
        expect(report.status).toBe('missing');
        expect(report.warnings).toEqual([`messages: file not found: ${missing}`]);
    });

    it('skips a row dated on a day that does not exist', () => {
        const { rows, report } = parseMessages([
            MESSAGE_HEADER,
            't1,c1,m1,s1,inbound,text,hi,2025-02-30T10:00:00Z,,'
        ].join('\n'));

        expect(rows).toEqual([]);
        expect(report.skipReasons).toEqual({ 'invalid-createdAt': 1 });
    });

    it('skips and counts malformed rows', () => {
        const csv = [
            MESSAGE_HEADER,
            't1,c1,m1,s1,inbound,text,ok,2025-07-20T10:00:00Z,,',
            't1,,m2,s1,inbound,text,no contact,2025-07-20T10:01:00Z,,',
            't1,c1,m3,s1,inbound,text,bad date,yesterday,,',
            't1,c1,m4,s1,inbound,text,short row',
            't1,c1,m5,s1,sideways,sticker,odd,2025-07-20T10:02:00Z,,'
        ].join('\n');

        const { rows, report } = parseMessages(csv);

        expect(rows.map(m => m.messageId)).toEqual(['m1', 'm5']);
        expect(report.skipped).toBe(3);
        expect(report.skipReasons).toEqual({
            'missing-contactID': 1,
            'invalid-createdAt': 1,
            'column-count': 1
        });
        expect(report.notes).toEqual({ 'unknown-direction': 1, 'unknown-type': 1 });
    });

    it('looks columns up by name regardless of order', () => {
        const csv = [
            'createdAt,messageValue,sessionID,messageID,contactID,messageDirection',
            '2025-07-20T10:00:00Z,hi there,s1,m1,c1,outbound'
        ].join('\n');

        const { rows } = parseMessages(csv);

        expect(rows).toHaveLength(1);
        expect(rows[0].sessionId).toBe('s1');
        expect(rows[0].content).toBe('hi there');
        expect(rows[0].direction).toBe('outbound');
        expect(rows[0].type).toBe('unknown');
        expect(rows[0].tenantId).toBeNull();
    });

    it('rejects a file lacking a required column', () => {
        const csv = ['contactID,sessionID,createdAt', 'c1,s1,2025-07-20T10:00:00Z'].join('\n');

        const { rows, report } = parseMessages(csv);

        expect(rows).toEqual([]);
        expect(report.status).toBe('missing-column');
        expect(report.warnings).toEqual(['messages: required column(s) missing: messageID']);
    });

    it('warns about an empty file', () => {
        const { rows, report } = parseMessages('');

        expect(rows).toEqual([]);
        expect(report.warnings).toEqual(['messages: file is empty']);
    });

    it('strips a byte order mark from the header', () => {
        const csv = `\uFEFF${MESSAGE_HEADER}\nt1,c1,m1,s1,inbound,text,ok,2025-07-20T10:00:00Z,,`;

        const { rows, report } = parseMessages(csv);

        expect(report.status).toBe('loaded');
        expect(rows).toHaveLength(1);
    });
});

describe('session loading', () => {
    it('loads the plain export without channel fields', async () => {
        const { rows, report } = await loadSessions(fixturePath('sessions.csv'));

        expect(report.rows).toBe(3);
        expect(rows[0].channel).toBeNull();
        expect(rows[2].operatorId).toBeNull();
        expect(rows[2].closureReason).toBe('closed_by_operator');
    });

    it('loads the channel export', async () => {
        const { rows } = await loadSessions(fixturePath('sessions_with_channel.csv'), 'sessionsWithChannel');

        expect(rows.map(s => [s.sessionId, s.channel, s.pluginLabel])).toEqual([
            ['s1', 'whatsapp', 'Main line'],
            ['s4', 'webchat', 'Site widget']
        ]);
    });

    it('skips a session whose manual time exceeds its total', () => {
        const csv = [
            'sessionID,__sessionManualDuration,__sessionDuration',
            's1,500,300',
            's2,100,300'
        ].join('\n');

        const { rows, report } = parseSessions(csv);

        expect(rows.map(s => s.sessionId)).toEqual(['s2']);
        expect(report.skipReasons).toEqual({ 'manual-exceeds-total': 1 });
    });
});

describe('mergeSessionSources', () => {
    it('fills channel fields and adds sessions only the channel export has', () => {
        const plain = [makeSession({ sessionId: 's1' }), makeSession({ sessionId: 's2' })];
        const withChannel = [
            makeSession({ sessionId: 's1', channel: 'whatsapp', pluginLabel: 'Main line' }),
            makeSession({ sessionId: 's3', channel: 'webchat' })
        ];

        const { sessions, duplicates } = mergeSessionSources(plain, withChannel);

        expect(sessions.map(s => [s.sessionId, s.channel, s.pluginLabel])).toEqual([
            ['s1', 'whatsapp', 'Main line'],
            ['s2', null, null],
            ['s3', 'webchat', null]
        ]);
        expect(duplicates).toBe(0);
    });

    it('keeps the first row of a repeated id and counts the rest', () => {
        const plain = [makeSession({ sessionId: 's1', rating: 5 }), makeSession({ sessionId: 's1', rating: 1 })];

        const { sessions, duplicates } = mergeSessionSources(plain, []);

        expect(sessions).toHaveLength(1);
        expect(sessions[0].rating).toBe(5);
        expect(duplicates).toBe(1);
    });
});

describe('source discovery', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'support-insights-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('detects the source kind from a header', () => {
        expect(detectSourceKind(['contactID', 'messageID', 'sessionID'])).toBe('messages');
        expect(detectSourceKind(['sessionID', 'operatorID'])).toBe('sessions');
        expect(detectSourceKind(['sessionID', 'sessionChannel'])).toBe('sessionsWithChannel');
        expect(detectSourceKind(['name', 'email'])).toBeNull();
    });

    it('finds renamed exports by their headers', () => {
        fs.copyFileSync(fixturePath('messages.csv'), path.join(dir, 'export-a.csv'));
        fs.copyFileSync(fixturePath('sessions_with_channel.csv'), path.join(dir, 'export-b.csv'));
        fs.writeFileSync(path.join(dir, 'notes.txt'), 'not a csv');

        const found = discoverSourceFiles(dir);

        expect(found).toEqual({
            messages: path.join(dir, 'export-a.csv'),
            sessions: null,
            sessionsWithChannel: path.join(dir, 'export-b.csv')
        });
    });

    it('sniffs headers with the configured delimiter', () => {
        fs.writeFileSync(path.join(dir, 'export-a.csv'), 'contactID;messageID;sessionID;createdAt\nc1;m1;s1;2025-07-20T10:00:00Z\n');

        expect(discoverSourceFiles(dir).messages).toBeNull();
        expect(discoverSourceFiles(dir, undefined, { delimiter: ';' }).messages).toBe(path.join(dir, 'export-a.csv'));
    });

    it('decodes a latin1 export', async () => {
        const file = path.join(dir, 'messages.csv');
        const csv = `${MESSAGE_HEADER}\nt1,c1,m1,s1,inbound,text,não funciona,2025-07-20T10:00:00Z,,\n`;
        fs.writeFileSync(file, Buffer.from(csv, 'latin1'));

        const { rows } = await loadMessages(file, { encoding: 'latin1' });

        expect(rows[0].content).toBe('não funciona');
    });
});
