/**
 * Source boards -> master board
 *
 * Cards that sit in a source board's priority list with checklists that are
 * mostly done are mirrored into that source's list on the master board. A
 * source set to `match: any` takes cards meeting either condition.
 */

import type { Logger } from '../logging/logger.js';
import type { NormalizedMirrorCardsConfig, NormalizedMirrorSource } from '../types/config.js';
import { normalizeListName } from '../reconciler/plan.js';
import type { SourceAdapter, SourceRecord, SourceSnapshot } from '../reconciler/types.js';
import type { TrelloApi, TrelloBoard, TrelloCard, TrelloList } from '../trello/types.js';

export const MIRROR_CARDS_JOB = 'mirror-cards';

export const MIRROR_COMMENT = '[Bot] Mirrored from source board.';

export interface MirrorSourceOptions {
  api: TrelloApi;
  config: NormalizedMirrorCardsConfig;
  logger: Logger;
}

/**
 * Share of checklist items marked complete, 0 when there are none.
 * With `checklistName` only that checklist counts.
 */
export function checklistCompletion(card: TrelloCard, checklistName?: string): number {
  const checklists = (card.checklists ?? []).filter(
    (checklist) => checklistName === undefined || checklist.name === checklistName
  );
  const items = checklists.flatMap((checklist) => checklist.checkItems);
  if (items.length === 0) {
    return 0;
  }
  const complete = items.filter((item) => item.state === 'complete').length;
  return complete / items.length;
}

/**
 * Whether a source card should be mirrored
 */
export function qualifiesForMirror(
  card: TrelloCard,
  lists: TrelloList[],
  source: NormalizedMirrorSource
): boolean {
  if (card.closed) {
    return false;
  }
  const list = lists.find((candidate) => candidate.id === card.idList);
  const inPriorityList = list !== undefined && normalizeListName(list.name) === normalizeListName(source.priorityList);
  const nearlyDone = checklistCompletion(card, source.checklistName) >= source.checklistThreshold;
  return source.match === 'all' ? inPriorityList && nearlyDone : inPriorityList || nearlyDone;
}

/**
 * Description of the mirror card
 */
export function mirrorDescription(description: string, boardName: string): string {
  const body = description.trimEnd();
  const footer = `Mirrored from ${boardName}.`;
  return body === '' ? footer : `${body}\n\n${footer}`;
}

export function toMirrorRecord(card: TrelloCard, board: TrelloBoard, source: NormalizedMirrorSource): SourceRecord {
  return {
    id: `${source.boardId}:${card.id}`,
    timestamp: card.dateLastActivity,
    content: {
      name: card.name,
      description: mirrorDescription(card.desc, board.name),
      list: { id: source.masterListId },
      due: card.due,
      // Uploaded files need the source board's credentials to open; links do not
      attachments: (card.attachments ?? [])
        .filter((attachment) => !attachment.isUpload)
        .map((attachment) => attachment.url),
      comment: MIRROR_COMMENT,
      checklists: (card.checklists ?? []).map((checklist) => ({
        name: checklist.name,
        items: checklist.checkItems.map((item) => ({ name: item.name, checked: item.state === 'complete' })),
      })),
      members: card.idMembers ?? [],
    },
  };
}

/**
 * Reads every configured source board in full
 */
export class MirrorCardsSource implements SourceAdapter {
  constructor(private readonly options: MirrorSourceOptions) {}

  async verify(): Promise<void> {
    const me = await this.options.api.getMe();
    this.options.logger.debug({ member: me.username }, 'Trello credentials verified');
  }

  async fetch(): Promise<SourceSnapshot> {
    const records: SourceRecord[] = [];

    for (const source of this.options.config.sources) {
      const board = await this.options.api.getBoard(source.boardId);
      const lists = await this.options.api.getBoardLists(source.boardId);
      const cards = await this.options.api.getBoardCards(source.boardId, {
        checklists: true,
        attachments: true,
      });

      const qualifying = cards.filter((card) => qualifiesForMirror(card, lists, source));
      this.options.logger.info(
        { board: board.name, cards: cards.length, qualifying: qualifying.length },
        'Read source board'
      );
      for (const card of qualifying) {
        records.push(toMirrorRecord(card, board, source));
      }
    }

    // Every source board is read in full, so absence means the card stopped qualifying
    return { records };
  }
}
