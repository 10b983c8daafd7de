import type { Logger } from '../logging/logger.js';
import { normalizeListName } from '../reconciler/plan.js';
import { parseMarker } from '../reconciler/marker.js';
import type {
  CardContent,
  CardPatch,
  CreatedCard,
  DestinationAdapter,
  DestinationCard,
  ListRef,
} from '../reconciler/types.js';
import type { TrelloApi, TrelloCard, TrelloList } from '../trello/types.js';

export interface TrelloBoardDestinationOptions {
  api: TrelloApi;
  boardId: string;
  logger: Logger;
}

/**
 * Convert a Trello card to the reconciler's view of it
 */
export function toDestinationCard(
  card: TrelloCard,
  lists: TrelloList[],
  namespace: string
): DestinationCard {
  return {
    id: card.id,
    name: card.name,
    description: card.desc,
    listId: card.idList,
    // Cards in archived lists get an empty name; they are matched by id only
    listName: lists.find((list) => list.id === card.idList)?.name ?? '',
    due: card.due,
    closed: card.closed,
    sourceId: parseMarker(card.desc, namespace),
  };
}

/**
 * One Trello board as a sync destination.
 *
 * Lists referenced by name are looked up case-insensitively and created at
 * the bottom of the board when missing. Lists are only ever created while
 * applying a change, so a dry run never creates one.
 */
export class TrelloBoardDestination implements DestinationAdapter {
  private lists: TrelloList[] | null = null;

  constructor(private readonly options: TrelloBoardDestinationOptions) {}

  async verify(): Promise<void> {
    const me = await this.options.api.getMe();
    const board = await this.options.api.getBoard(this.options.boardId);
    this.options.logger.debug({ member: me.username, board: board.name }, 'Trello credentials verified');
  }

  async listCards(namespace: string): Promise<DestinationCard[]> {
    const lists = await this.getLists();
    const cards = await this.options.api.getBoardCards(this.options.boardId, { includeClosed: true });
    return cards.map((card) => toDestinationCard(card, lists, namespace));
  }

  async createCard(content: CardContent): Promise<CreatedCard> {
    const list = await this.resolveList(content.list);
    const card = await this.options.api.createCard({
      listId: list.id,
      name: content.name,
      description: content.description,
      due: content.due,
    });

    for (const memberId of content.members ?? []) {
      await this.options.api.addMember(card.id, memberId);
    }
    for (const url of content.attachments) {
      await this.options.api.addAttachment(card.id, url);
    }
    for (const checklist of content.checklists ?? []) {
      const created = await this.options.api.createChecklist(card.id, checklist.name);
      for (const item of checklist.items) {
        await this.options.api.addCheckItem(created.id, item.name, item.checked);
      }
    }
    if (content.comment) {
      await this.options.api.addComment(card.id, content.comment);
    }

    return { id: card.id, name: card.name };
  }

  async updateCard(cardId: string, patch: CardPatch): Promise<void> {
    const listId = patch.list ? (await this.resolveList(patch.list)).id : undefined;
    await this.options.api.updateCard(cardId, {
      name: patch.name,
      description: patch.description,
      listId,
      due: patch.due,
      closed: patch.closed,
    });
  }

  async archiveCard(cardId: string, moveToListId?: string): Promise<void> {
    await this.options.api.updateCard(cardId, { listId: moveToListId, closed: true });
  }

  /**
   * Find a list by id or name, creating a named list that does not exist yet
   */
  async resolveList(ref: ListRef): Promise<TrelloList> {
    const lists = await this.getLists();

    if ('id' in ref) {
      const list = lists.find((candidate) => candidate.id === ref.id);
      return list ?? { id: ref.id, name: '', closed: false, idBoard: this.options.boardId };
    }

    const wanted = normalizeListName(ref.name);
    const existing = lists.find((candidate) => normalizeListName(candidate.name) === wanted);
    if (existing) {
      return existing;
    }

    const created = await this.options.api.createList(this.options.boardId, ref.name.trim());
    this.options.logger.info({ listId: created.id, name: created.name }, 'Created list');
    lists.push(created);
    return created;
  }

  private async getLists(): Promise<TrelloList[]> {
    if (!this.lists) {
      this.lists = await this.options.api.getBoardLists(this.options.boardId);
    }
    return this.lists;
  }
}
