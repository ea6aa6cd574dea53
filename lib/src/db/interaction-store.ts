/**
 * Interaction Store
 *
 * Append-only persistence of chat turns plus the history and statistics
 * reads. Every failure surfaces as a PersistenceError.
 */

import { ZodError } from 'zod';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import { getDatabasePool, type SqlExecutor } from './client.js';
import {
  CreateInteractionInputSchema,
  HistoryOptionsSchema,
  PersistenceError,
  PersistenceErrorCode,
  getEmptyStatistics,
  rowToInteraction,
  type AppendResult,
  type CreateInteractionInput,
  type HistoryOptionsInput,
  type Interaction,
  type InteractionRow,
  type InteractionStatistics,
  type InteractionStatisticsRow,
} from './types.js';

export const INTERACTIONS_TABLE = 'chat_interactions';

export interface InteractionStoreDependencies {
  db?: SqlExecutor;
  logger?: Logger;
  /** Clock used to anchor "current day"; defaults to the system clock */
  now?: () => Date;
}

/**
 * 00:00 UTC of the date `now` falls on.
 */
export function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

function invalidInput(error: ZodError, context: string): PersistenceError {
  const detail = error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ');
  return new PersistenceError(`${context}: ${detail}`, PersistenceErrorCode.INVALID_INPUT, {
    cause: error,
  });
}

export class InteractionStore {
  private readonly db: SqlExecutor;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: InteractionStoreDependencies = {}) {
    this.db = deps.db ?? getDatabasePool();
    this.logger = deps.logger ?? getGlobalLogger().child('InteractionStore');
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Insert one interaction. Zero affected rows is logged, not raised.
   *
   * @throws {PersistenceError}
   */
  async append(input: CreateInteractionInput): Promise<AppendResult> {
    const parsed = CreateInteractionInputSchema.safeParse(input);
    if (!parsed.success) {
      throw invalidInput(parsed.error, 'Invalid interaction');
    }
    const { userId, question, answer, context } = parsed.data;

    let rows: InteractionRow[];
    try {
      const result = await this.db.query<InteractionRow>(
        `INSERT INTO ${INTERACTIONS_TABLE} (user_id, question, answer, context)
         VALUES ($1, $2, $3, $4)
         RETURNING id, user_id, question, answer, context, created_at`,
        [userId, question, answer, context]
      );
      rows = result.rows;
    } catch (error) {
      const wrapped = PersistenceError.fromError(error, 'Failed to save interaction');
      this.logger.error('Failed to save interaction', wrapped, { userId, code: wrapped.code });
      throw wrapped;
    }

    const row = rows[0];
    if (!row) {
      this.logger.warn('No row returned when saving interaction', { userId });
      return { inserted: false, interaction: null };
    }

    this.logger.info('Saved chat interaction', { userId });
    return { inserted: true, interaction: rowToInteraction(row) };
  }

  /**
   * Interactions of one user, newest first.
   *
   * @throws {PersistenceError}
   */
  async history(userId: string, options: HistoryOptionsInput = {}): Promise<Interaction[]> {
    if (!userId.trim()) {
      throw new PersistenceError('userId is required', PersistenceErrorCode.INVALID_INPUT);
    }
    const parsed = HistoryOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw invalidInput(parsed.error, 'Invalid history options');
    }
    const { limit, offset } = parsed.data;

    try {
      const result = await this.db.query<InteractionRow>(
        `SELECT id, user_id, question, answer, context, created_at
         FROM ${INTERACTIONS_TABLE}
         WHERE user_id = $1
         ORDER BY created_at DESC, id DESC
         LIMIT $2 OFFSET $3`,
        [userId, limit, offset]
      );
      return result.rows.map(rowToInteraction);
    } catch (error) {
      const wrapped = PersistenceError.fromError(error, 'Failed to load chat history');
      this.logger.error('Failed to load chat history', wrapped, { userId, code: wrapped.code });
      throw wrapped;
    }
  }

  /**
   * Aggregates for one user, or across all users when `userId` is omitted.
   *
   * @throws {PersistenceError}
   */
  async statistics(userId?: string): Promise<InteractionStatistics> {
    const dayStart = startOfUtcDay(this.now());
    const scoped = userId !== undefined;

    try {
      const result = await this.db.query<InteractionStatisticsRow>(
        `SELECT
           COUNT(*)::TEXT AS total_count,
           COUNT(DISTINCT user_id)::TEXT AS distinct_user_count,
           COUNT(*) FILTER (WHERE created_at >= $1)::TEXT AS count_in_current_day,
           AVG(CHAR_LENGTH(answer))::TEXT AS mean_answer_length
         FROM ${INTERACTIONS_TABLE}
         ${scoped ? 'WHERE user_id = $2' : ''}`,
        scoped ? [dayStart, userId] : [dayStart]
      );

      const row = result.rows[0];
      if (!row) {
        return getEmptyStatistics();
      }

      const totalCount = parseInt(row.total_count, 10);
      return {
        totalCount,
        distinctUserCount: parseInt(row.distinct_user_count, 10),
        countInCurrentDay: parseInt(row.count_in_current_day, 10),
        meanAnswerLength:
          totalCount > 0 && row.mean_answer_length !== null ? parseFloat(row.mean_answer_length) : 0,
      };
    } catch (error) {
      const wrapped = PersistenceError.fromError(error, 'Failed to compute chat statistics');
      this.logger.error('Failed to compute chat statistics', wrapped, { code: wrapped.code });
      throw wrapped;
    }
  }

  /**
   * Check the table with a trivial read.
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.db.query(`SELECT 1 FROM ${INTERACTIONS_TABLE} LIMIT 1`);
      return true;
    } catch (error) {
      this.logger.error('Interaction store connection test failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}

export function createInteractionStore(deps?: InteractionStoreDependencies): InteractionStore {
  return new InteractionStore(deps);
}
