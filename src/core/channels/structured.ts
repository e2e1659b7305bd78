import { errorMessage, type Logger } from '../log';
import type { EntryStore } from '../store/types';
import type { RelationHit } from '../types';
import { defaultStopWords, extractKeywords } from './keywords';
import type { RelationAdapter } from './types';

/** Relations whose subject or object contains a query keyword. Not fusible. */
export function createStructuredChannel(params: {
  store: EntryStore;
  log: Logger;
  stopWords?: ReadonlySet<string>;
}): RelationAdapter {
  const stopWords = params.stopWords ?? defaultStopWords();
  const log = params.log.child({ channel: 'structured' });
  return async (queryText, limit) => {
    const keywords = extractKeywords(queryText, stopWords);
    if (keywords.length === 0) return [];
    try {
      const relations = await params.store.matchRelations(keywords, limit);
      const hits: RelationHit[] = [];
      const seen = new Set<string>();
      for (const relation of relations) {
        const key = [relation.subject, relation.predicate, relation.object, relation.entryId].join('\u0000');
        if (seen.has(key)) continue;
        seen.add(key);
        const subject = relation.subject.toLowerCase();
        const object = relation.object.toLowerCase();
        const matched = keywords.find((k) => subject.includes(k) || object.includes(k)) ?? keywords[0] ?? '';
        hits.push({ relation, matched });
        if (hits.length >= limit) break;
      }
      return hits;
    } catch (e) {
      log.warn('relation_match_failed', { err: errorMessage(e) });
      return [];
    }
  };
}
