/**
 * Read API over stored meetings, agenda items and search
 */

import express, { Router, type Express } from 'express';
import { z } from 'zod';
import { APP_VERSION, SEARCH_WORKING_SET, type AppConfig } from '../config.js';
import { NotFoundError } from '../errors.js';
import { searchItems, searchStats } from '../search.js';
import { TOPICS, type AgendaItem } from '../types.js';
import { asyncHandler, corsHeaders, errorHandler, parseQuery, requestLogger } from './middleware.js';
import type { Logger } from '../logger.js';
import type { RecordStore } from '../store/index.js';

export interface ApiDeps {
  store: RecordStore;
  logger: Logger;
  config: Pick<AppConfig, 'stage'>;
}

const RECENT_ITEMS_LIMIT = 500;
const HIGH_RELEVANCE = 4;

const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const MeetingsQuery = z.object({
  body: z.preprocess(blankToUndefined, z.string().optional()),
  limit: z.coerce.number().int().min(1).max(200).default(50)
});

const ItemsQuery = z.object({
  topic: z.preprocess(blankToUndefined, z.enum(TOPICS).optional()),
  min_relevance: z.coerce.number().int().min(1).max(5).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(50)
});

const SearchQuery = z.object({
  q: z.string().trim().min(1, 'Query must not be empty'),
  limit: z.coerce.number().int().min(1).max(50).default(10)
});

export function createApiRouter(deps: ApiDeps): Router {
  const { store } = deps;
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy', stage: deps.config.stage, version: APP_VERSION });
  });

  router.get(
    '/meetings',
    asyncHandler(async (req, res) => {
      const { body, limit } = parseQuery(MeetingsQuery, req.query);
      const meetings = await store.listMeetings({ body, limit });
      res.json({ count: meetings.length, meetings });
    })
  );

  router.get(
    '/meetings/:meetingId',
    asyncHandler(async (req, res) => {
      const { meetingId } = req.params;
      const meeting = await store.getMeeting(meetingId);
      if (!meeting) {
        throw new NotFoundError('Meeting', meetingId);
      }
      const [items, documents] = await Promise.all([
        store.listItemsForMeeting(meetingId),
        store.listDocumentsForMeeting(meetingId)
      ]);
      res.json({ meeting, items, documents });
    })
  );

  router.get(
    '/items',
    asyncHandler(async (req, res) => {
      const { topic, min_relevance, limit } = parseQuery(ItemsQuery, req.query);
      const candidates = topic
        ? await store.listItemsByTopic(topic, RECENT_ITEMS_LIMIT)
        : await store.listRecentItems(RECENT_ITEMS_LIMIT);

      const items = candidates
        .filter(item => item.relevance >= min_relevance)
        .sort((a, b) => b.relevance - a.relevance)
        .slice(0, limit);
      res.json({ count: items.length, items });
    })
  );

  router.get(
    '/search',
    asyncHandler(async (req, res) => {
      const { q, limit } = parseQuery(SearchQuery, req.query);
      const [results, stats] = await Promise.all([searchItems(store, q, { topK: limit }), searchStats(store)]);
      res.json({ query: q, count: results.length, total_indexed: stats.total_items, results });
    })
  );

  router.get(
    '/stats',
    asyncHandler(async (_req, res) => {
      const [meetings, agendaItems, recent] = await Promise.all([
        store.countMeetings(),
        store.countAgendaItems(),
        store.listRecentItems(SEARCH_WORKING_SET)
      ]);
      res.json({
        meetings,
        agenda_items: agendaItems,
        high_relevance: recent.filter(item => item.relevance >= HIGH_RELEVANCE).length,
        topics: distinctTopics(recent)
      });
    })
  );

  return router;
}

function distinctTopics(items: AgendaItem[]): string[] {
  return [...new Set(items.map(item => item.topic))].sort();
}

export function createApp(deps: ApiDeps): Express {
  const logger = deps.logger.child({ component: 'api' });
  const app = express();

  app.disable('x-powered-by');
  app.use(corsHeaders());
  app.use(requestLogger(logger));
  app.use('/api', createApiRouter({ ...deps, logger }));
  app.use(errorHandler(logger));

  return app;
}
