import type { Session } from '../types';

// ============================================================================
// SESSION SOURCE MERGING
// ============================================================================

export type MergedSessions = {
    sessions: Session[];
    duplicates: number;
};

/**
 * Unions the plain sessions export with the channel-bearing one by session id.
 * The plain export supplies the base row; the channel export fills in
 * `channel` and `pluginLabel` and contributes sessions the plain export lacks.
 * Repeated ids within a source keep their first row and are counted.
 */
export function mergeSessionSources(plain: readonly Session[], withChannel: readonly Session[]): MergedSessions {
    const merged = new Map<string, Session>();
    const enriched = new Set<string>();
    let duplicates = 0;

    for (const session of plain) {
        if (merged.has(session.sessionId)) {
            duplicates += 1;
            continue;
        }
        merged.set(session.sessionId, session);
    }

    for (const session of withChannel) {
        const base = merged.get(session.sessionId);

        if (!base) {
            merged.set(session.sessionId, session);
            enriched.add(session.sessionId);
            continue;
        }

        if (enriched.has(session.sessionId)) {
            duplicates += 1;
            continue;
        }

        merged.set(session.sessionId, {
            ...base,
            channel: session.channel ?? base.channel,
            pluginLabel: session.pluginLabel ?? base.pluginLabel
        });
        enriched.add(session.sessionId);
    }

    return { sessions: Array.from(merged.values()), duplicates };
}
