import { errorMessage, type Logger } from '../log';
import type { EntryStore } from '../store/types';
import type { Candidate } from '../types';
import { defaultStopWords, extractKeywords, toOrQuery } from './keywords';
import type { ChannelAdapter } from './types';

export function createKeywordChannel(params: {
  store: EntryStore;
  log: Logger;
  stopWords?: ReadonlySet<string>;
}): ChannelAdapter {
  const stopWords = params.stopWords ?? defaultStopWords();
  const log = params.log.child({ channel: 'keyword' });
  return async (queryText, limit) => {
    const keywords = extractKeywords(queryText, stopWords);
    if (keywords.length === 0) {
      log.debug('no_keywords', { query: queryText });
      return [];
    }
    try {
      const rows = await params.store.keywordSearch(keywords, limit);
      log.debug('keyword_search', { match: toOrQuery(keywords), hits: rows.length });
      return rows.slice(0, limit).map<Candidate>((row, rank) => ({
        entryId: row.entryId,
        text: row.text,
        channels: ['keyword'],
        ranks: { keyword: rank },
        keywordScore: row.score,
      }));
    } catch (e) {
      log.warn('keyword_search_failed', { match: toOrQuery(keywords), err: errorMessage(e) });
      return [];
    }
  };
}
