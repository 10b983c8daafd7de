/**
 * Trello REST API response types (only the fields the jobs request)
 */

export interface TrelloMember {
  id: string;
  username: string;
  fullName?: string;
}

export interface TrelloBoard {
  id: string;
  name: string;
  closed: boolean;
  url?: string;
}

export interface TrelloList {
  id: string;
  name: string;
  closed: boolean;
  idBoard: string;
}

export interface TrelloLabel {
  id: string;
  name: string;
  color: string | null;
}

export interface TrelloCheckItem {
  id: string;
  name: string;
  state: 'complete' | 'incomplete';
}

export interface TrelloChecklist {
  id: string;
  name: string;
  checkItems: TrelloCheckItem[];
}

export interface TrelloAttachment {
  id: string;
  name: string;
  url: string;
  isUpload?: boolean;
}

export interface TrelloCard {
  id: string;
  name: string;
  desc: string;
  idList: string;
  idBoard: string;
  closed: boolean;
  due: string | null;
  dateLastActivity: string;
  labels: TrelloLabel[];
  idMembers?: string[];
  checklists?: TrelloChecklist[];
  attachments?: TrelloAttachment[];
}

/**
 * Options for listing the cards of a board
 */
export interface ListCardsOptions {
  /** Include archived cards (needed to find cards the sync archived earlier) */
  includeClosed?: boolean;
  /** Embed checklists with their items */
  checklists?: boolean;
  /** Embed attachments */
  attachments?: boolean;
}

export interface CreateCardInput {
  listId: string;
  name: string;
  description: string;
  due?: string | null;
}

/**
 * Absolute field values; every call with the same input yields the same card
 */
export interface UpdateCardInput {
  name?: string;
  description?: string;
  listId?: string;
  due?: string | null;
  closed?: boolean;
}

/**
 * The subset of the Trello API the jobs depend on
 */
export interface TrelloApi {
  getMe(): Promise<TrelloMember>;
  getMemberBoards(): Promise<TrelloBoard[]>;
  getBoard(boardId: string): Promise<TrelloBoard>;
  getBoardLists(boardId: string): Promise<TrelloList[]>;
  createList(boardId: string, name: string): Promise<TrelloList>;
  getBoardCards(boardId: string, options?: ListCardsOptions): Promise<TrelloCard[]>;
  createCard(input: CreateCardInput): Promise<TrelloCard>;
  updateCard(cardId: string, update: UpdateCardInput): Promise<TrelloCard>;
  addAttachment(cardId: string, url: string): Promise<TrelloAttachment>;
  addComment(cardId: string, text: string): Promise<void>;
  addMember(cardId: string, memberId: string): Promise<void>;
  createChecklist(cardId: string, name: string): Promise<TrelloChecklist>;
  addCheckItem(checklistId: string, name: string, checked: boolean): Promise<TrelloCheckItem>;
}
