export {
  TrelloClient,
  TrelloApiError,
  createTrelloClient,
  parseRetryAfterMs,
  type TrelloClientOptions,
} from './client.js';

export type {
  TrelloApi,
  TrelloMember,
  TrelloBoard,
  TrelloList,
  TrelloLabel,
  TrelloCard,
  TrelloChecklist,
  TrelloCheckItem,
  TrelloAttachment,
  ListCardsOptions,
  CreateCardInput,
  UpdateCardInput,
} from './types.js';
