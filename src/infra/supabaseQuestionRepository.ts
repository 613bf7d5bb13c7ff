/**
 * Question repository backed by a hosted Supabase table.
 *
 * Table `questions` columns: id, title, mastery, difficulty_level,
 * difficulty_rating, question_text, expected_outcome.
 *
 * Failures (network, error replies, malformed rows) reject; the request
 * handler reports them as internal errors.
 */

import { createClient } from '@supabase/supabase-js';
import type {
  PageOptions,
  Question,
  QuestionFilter,
  QuestionId,
  QuestionRepository,
} from '../domain/questions.js';
import { parseQuestionRows } from './inMemoryQuestionRepository.js';

export interface SupabaseRepositoryOptions {
  url: string;
  key: string;
  table?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Rows read per request while listing masteries */
  pageSize?: number;
  fetch?: typeof fetch;
}

const QUESTION_COLUMNS =
  'id,title,mastery,difficulty_level,difficulty_rating,question_text,expected_outcome';

const DEFAULT_PAGE_SIZE = 1000;

function requestFailed(message: string): Error {
  return new Error(`Question repository request failed: ${message}`);
}

/** PostgREST list literal for an `in` / `not in` filter */
function postgrestList(values: readonly string[]): string {
  return `(${values.map((value) => `"${value.replace(/["\\]/g, '\\$&')}"`).join(',')})`;
}

export function createSupabaseQuestionRepository(
  options: SupabaseRepositoryOptions
): QuestionRepository {
  const client = createClient(options.url, options.key, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: options.fetch ? { fetch: options.fetch } : {},
  });
  const table = options.table ?? 'questions';
  const timeoutMs = options.timeoutMs ?? 8000;
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;

  function selectQuestions(filter: QuestionFilter) {
    let query = client
      .from(table)
      .select(QUESTION_COLUMNS)
      .abortSignal(AbortSignal.timeout(timeoutMs));

    if (filter.mastery !== undefined) {
      query = query.eq('mastery', filter.mastery);
    }
    if (filter.difficultyTier !== undefined) {
      query = query.eq('difficulty_level', filter.difficultyTier);
    }
    if (filter.difficultyTiers !== undefined) {
      query = query.in('difficulty_level', [...filter.difficultyTiers]);
    }
    if (filter.excludeIds !== undefined && filter.excludeIds.length > 0) {
      query = query.not('id', 'in', postgrestList(filter.excludeIds));
    }
    if (filter.difficultyRatingRange?.min !== undefined) {
      query = query.gte('difficulty_rating', filter.difficultyRatingRange.min);
    }
    if (filter.difficultyRatingRange?.max !== undefined) {
      query = query.lte('difficulty_rating', filter.difficultyRatingRange.max);
    }
    return query.order('difficulty_rating', { ascending: true }).order('id', { ascending: true });
  }

  async function readQuestions(
    query: PromiseLike<{ data: unknown; error: { message: string } | null }>
  ): Promise<Question[]> {
    const { data, error } = await query;
    if (error) {
      throw requestFailed(error.message);
    }
    return parseQuestionRows(data);
  }

  return {
    async find(filter: QuestionFilter, page: PageOptions) {
      return readQuestions(selectQuestions(filter).range(page.offset, page.offset + page.limit - 1));
    },

    async findById(id: QuestionId) {
      const [question] = await readQuestions(selectQuestions({}).eq('id', id).limit(1));
      return question;
    },

    async countByMastery(mastery: string) {
      const { count, error } = await client
        .from(table)
        .select('id', { count: 'exact', head: true })
        .eq('mastery', mastery)
        .abortSignal(AbortSignal.timeout(timeoutMs));
      if (error) {
        throw requestFailed(error.message);
      }
      if (count === null) {
        throw requestFailed('no row count in reply');
      }
      return count;
    },

    async listMasteries() {
      const masteries = new Set<string>();
      for (let from = 0; ; from += pageSize) {
        const { data, error } = await client
          .from(table)
          .select('mastery')
          .order('mastery', { ascending: true })
          .order('id', { ascending: true })
          .range(from, from + pageSize - 1)
          .abortSignal(AbortSignal.timeout(timeoutMs));
        if (error) {
          throw requestFailed(error.message);
        }

        const rows: unknown[] = data ?? [];
        for (const row of rows) {
          if (typeof row === 'object' && row !== null && 'mastery' in row && typeof row.mastery === 'string') {
            masteries.add(row.mastery);
          }
        }
        if (rows.length < pageSize) {
          break;
        }
      }
      return Array.from(masteries);
    },
  };
}
