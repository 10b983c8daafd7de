/**
 * Board housekeeping
 *
 * - cards labelled "Completed..." are moved to the completed list and archived
 * - cards overdue by a few days get their due date pushed to next Monday
 */

import type { Logger } from '../logging/logger.js';
import type { NormalizedCardMaintenanceConfig } from '../types/config.js';
import { ApplyError, FetchError, errorMessage } from '../types/errors.js';
import { classifyError } from '../reconciler/reconciler.js';
import type {
  ArchiveChange,
  ErrorRecord,
  RunnableJob,
  RunResult,
  UpdateChange,
} from '../reconciler/types.js';
import type { TrelloApi, TrelloBoard, TrelloCard, TrelloList } from '../trello/types.js';
import { TrelloBoardDestination } from './trello-destination.js';

export const CARD_MAINTENANCE_JOB = 'card-maintenance';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CardMaintenanceOptions {
  api: TrelloApi;
  config: NormalizedCardMaintenanceConfig;
  logger: Logger;
  now?: () => Date;
}

/**
 * The Monday after `now`, at the given UTC time of day. On a Monday this is
 * the following Monday.
 */
export function nextMonday(now: Date, timeOfDay: Date = now): Date {
  const daysAhead = (1 - now.getUTCDay() + 7) % 7 || 7;
  return new Date(Date.UTC(
    now.getUTCFullYear(),
    now.getUTCMonth(),
    now.getUTCDate() + daysAhead,
    timeOfDay.getUTCHours(),
    timeOfDay.getUTCMinutes(),
    timeOfDay.getUTCSeconds(),
    timeOfDay.getUTCMilliseconds()
  ));
}

/**
 * Whether a due date lies at least `days` whole days in the past
 */
export function isOverdueBy(due: string | null, now: Date, days: number): boolean {
  if (due === null) {
    return false;
  }
  const dueMs = Date.parse(due);
  if (Number.isNaN(dueMs)) {
    return false;
  }
  return Math.floor((now.getTime() - dueMs) / DAY_MS) >= days;
}

export function hasCompletedLabel(card: TrelloCard, prefix: string): boolean {
  return card.labels.some((label) => label.name.startsWith(prefix));
}

/**
 * The list completed cards go to: the first whose name mentions "completed",
 * else the first whose name mentions "priority"
 */
export function findCompletedList(lists: TrelloList[]): TrelloList | undefined {
  return (
    lists.find((list) => list.name.toLowerCase().includes('completed')) ??
    lists.find((list) => list.name.toLowerCase().includes('priority'))
  );
}

export class CardMaintenanceJob implements RunnableJob {
  private readonly now: () => Date;

  constructor(private readonly options: CardMaintenanceOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async run(dryRun: boolean): Promise<RunResult> {
    const { api, config, logger } = this.options;
    const result: RunResult = {
      created: 0,
      updated: 0,
      archived: 0,
      unchanged: 0,
      errors: [],
      dryRun,
      changes: [],
    };

    logger.info({ job: CARD_MAINTENANCE_JOB, dryRun }, 'Starting card maintenance');

    let board: TrelloBoard;
    let lists: TrelloList[];
    let cards: TrelloCard[];
    try {
      await api.getMe();
      board = await this.findBoard();
      lists = await api.getBoardLists(board.id);
      cards = await api.getBoardCards(board.id);
    } catch (error) {
      throw classifyError(error, 'Reading board failed');
    }

    logger.info({ board: board.name, cards: cards.length }, 'Processing cards');

    const now = this.now();
    const completedList = findCompletedList(lists);
    const changes: Array<UpdateChange | ArchiveChange> = [];

    for (const card of cards) {
      if (card.closed) {
        continue;
      }

      if (hasCompletedLabel(card, config.completedLabelPrefix)) {
        if (!completedList) {
          result.errors.push(
            this.recordError('archive', card.id, card.name, 'No completed or priority list on the board')
          );
          continue;
        }
        const change: ArchiveChange = {
          type: 'archive',
          sourceId: card.id,
          cardId: card.id,
          cardName: card.name,
          reason: 'completed',
          moveToListId: completedList.id,
        };
        changes.push(change);
        continue;
      }

      if (card.due !== null && isOverdueBy(card.due, now, config.overdueDays)) {
        const change: UpdateChange = {
          type: 'update',
          sourceId: card.id,
          sourceTimestamp: card.dateLastActivity,
          cardId: card.id,
          cardName: card.name,
          patch: { due: nextMonday(now, new Date(card.due)).toISOString() },
        };
        changes.push(change);
        continue;
      }

      result.unchanged++;
    }

    result.changes = changes;

    if (dryRun) {
      for (const change of changes) {
        logger.info({ change }, `Dry run: would ${change.type} "${change.cardName}"`);
        this.count(result, change);
      }
      return result;
    }

    const destination = new TrelloBoardDestination({ api, boardId: board.id, logger });
    for (const change of changes) {
      try {
        if (change.type === 'archive') {
          await destination.archiveCard(change.cardId, change.moveToListId);
          logger.info({ cardId: change.cardId }, `Marked card "${change.cardName}" as completed`);
        } else {
          await destination.updateCard(change.cardId, change.patch);
          logger.info({ cardId: change.cardId, due: change.patch.due }, `Moved due date of "${change.cardName}"`);
        }
        this.count(result, change);
      } catch (error) {
        result.errors.push(
          this.recordError(change.type, change.cardId, change.cardName, errorMessage(error), error)
        );
      }
    }

    logger.info(
      {
        updated: result.updated,
        archived: result.archived,
        unchanged: result.unchanged,
        errors: result.errors.length,
      },
      'Card maintenance finished'
    );

    return result;
  }

  private async findBoard(): Promise<TrelloBoard> {
    const { api, config } = this.options;
    if (config.boardId) {
      return api.getBoard(config.boardId);
    }
    const boards = await api.getMemberBoards();
    const board = boards.find((candidate) => candidate.name === config.boardName);
    if (!board) {
      throw new FetchError(`Board "${config.boardName ?? ''}" not found`);
    }
    return board;
  }

  private count(result: RunResult, change: UpdateChange | ArchiveChange): void {
    if (change.type === 'archive') {
      result.archived++;
    } else {
      result.updated++;
    }
  }

  private recordError(
    operation: ErrorRecord['operation'],
    cardId: string,
    cardName: string,
    message: string,
    cause?: unknown
  ): ErrorRecord {
    const error = new ApplyError(`${operation} failed for "${cardName}": ${message}`, cardId, cause);
    this.options.logger.error({ err: error, cardId }, error.message);
    return {
      kind: 'apply',
      operation,
      sourceId: cardId,
      cardId,
      message: error.message,
    };
  }
}
