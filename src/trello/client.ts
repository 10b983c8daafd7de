import type {
  CreateCardInput,
  ListCardsOptions,
  TrelloApi,
  TrelloAttachment,
  TrelloBoard,
  TrelloCard,
  TrelloCheckItem,
  TrelloChecklist,
  TrelloList,
  TrelloMember,
  UpdateCardInput,
} from './types.js';

const TRELLO_API_ENDPOINT = 'https://api.trello.com/1';
const MAX_RETRIES = 5;
const BASE_DELAY_MS = 500;

const CARD_FIELDS = 'id,name,desc,idList,idBoard,closed,due,dateLastActivity,labels,idMembers';

type QueryValue = string | number | boolean | null | undefined;

export interface TrelloClientOptions {
  apiKey: string;
  token: string;
  baseUrl?: string;
  maxRetries?: number;
  baseDelayMs?: number;
  /** Replaced in tests */
  fetch?: typeof fetch;
  /** Replaced in tests to skip backoff delays */
  sleep?: (ms: number) => Promise<void>;
}

export class TrelloApiError extends Error {
  /** Delay requested by a 429 response, when Trello sent one */
  retryAfterMs: number | null = null;

  constructor(
    message: string,
    public readonly status?: number,
    public readonly isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'TrelloApiError';
  }

  /** The key or token was rejected */
  get isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Parse a Retry-After header given in seconds or as an HTTP date
 */
export function parseRetryAfterMs(value: string | null, now: number = Date.now()): number | null {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const timestamp = Date.parse(value);
  if (!Number.isNaN(timestamp)) {
    return Math.max(0, timestamp - now);
  }
  return null;
}

function buildSearchParams(params: Record<string, QueryValue>): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    // Trello clears a field when it receives an empty value
    search.set(key, value === null ? '' : String(value));
  }
  return search;
}

/**
 * Trello REST client with key/token authentication and retry on rate limits
 */
export class TrelloClient implements TrelloApi {
  private readonly apiKey: string;
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TrelloClientOptions) {
    this.apiKey = options.apiKey;
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? TRELLO_API_ENDPOINT).replace(/\/+$/, '');
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * The member the token belongs to; used to validate credentials
   */
  async getMe(): Promise<TrelloMember> {
    return this.request<TrelloMember>('GET', 'members/me', { fields: 'id,username,fullName' });
  }

  async getMemberBoards(): Promise<TrelloBoard[]> {
    return this.request<TrelloBoard[]>('GET', 'members/me/boards', {
      fields: 'id,name,closed,url',
      filter: 'open',
    });
  }

  async getBoard(boardId: string): Promise<TrelloBoard> {
    return this.request<TrelloBoard>('GET', `boards/${boardId}`, { fields: 'id,name,closed,url' });
  }

  async getBoardLists(boardId: string): Promise<TrelloList[]> {
    return this.request<TrelloList[]>('GET', `boards/${boardId}/lists`, {
      fields: 'id,name,closed,idBoard',
      filter: 'open',
    });
  }

  async createList(boardId: string, name: string): Promise<TrelloList> {
    return this.request<TrelloList>('POST', 'lists', { idBoard: boardId, name, pos: 'bottom' });
  }

  async getBoardCards(boardId: string, options: ListCardsOptions = {}): Promise<TrelloCard[]> {
    const filter = options.includeClosed ? 'all' : 'open';
    return this.request<TrelloCard[]>('GET', `boards/${boardId}/cards/${filter}`, {
      fields: CARD_FIELDS,
      checklists: options.checklists ? 'all' : undefined,
      checkItem_fields: options.checklists ? 'name,state' : undefined,
      attachments: options.attachments ? 'true' : undefined,
      attachment_fields: options.attachments ? 'id,name,url,isUpload' : undefined,
    });
  }

  async createCard(input: CreateCardInput): Promise<TrelloCard> {
    return this.request<TrelloCard>('POST', 'cards', {
      idList: input.listId,
      name: input.name,
      desc: input.description,
      due: input.due,
    });
  }

  async updateCard(cardId: string, update: UpdateCardInput): Promise<TrelloCard> {
    return this.request<TrelloCard>('PUT', `cards/${cardId}`, {
      name: update.name,
      desc: update.description,
      idList: update.listId,
      due: update.due,
      closed: update.closed,
    });
  }

  async addAttachment(cardId: string, url: string): Promise<TrelloAttachment> {
    return this.request<TrelloAttachment>('POST', `cards/${cardId}/attachments`, { url });
  }

  async addComment(cardId: string, text: string): Promise<void> {
    await this.request<unknown>('POST', `cards/${cardId}/actions/comments`, { text });
  }

  async addMember(cardId: string, memberId: string): Promise<void> {
    await this.request<unknown>('POST', `cards/${cardId}/idMembers`, { value: memberId });
  }

  async createChecklist(cardId: string, name: string): Promise<TrelloChecklist> {
    return this.request<TrelloChecklist>('POST', `cards/${cardId}/checklists`, { name });
  }

  async addCheckItem(checklistId: string, name: string, checked: boolean): Promise<TrelloCheckItem> {
    return this.request<TrelloCheckItem>('POST', `checklists/${checklistId}/checkItems`, { name, checked });
  }

  /**
   * Execute a request, retrying rate limits, server errors and network failures
   * with exponential backoff
   */
  private async request<T>(
    method: 'GET' | 'POST' | 'PUT' | 'DELETE',
    endpoint: string,
    params: Record<string, QueryValue> = {}
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    const search = buildSearchParams({ ...params, key: this.apiKey, token: this.token });
    let body: URLSearchParams | undefined;
    if (method === 'GET' || method === 'DELETE') {
      url.search = search.toString();
    } else {
      body = search;
    }

    let lastError: TrelloApiError | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        await this.sleep(this.backoffDelay(attempt - 1, lastError));
      }

      let response: Response;
      try {
        response = await this.fetchImpl(url.toString(), {
          method,
          body,
          headers: { Accept: 'application/json' },
        });
      } catch (error) {
        lastError = new TrelloApiError(
          `Trello request ${method} /${endpoint} failed: ${error instanceof Error ? error.message : String(error)}`,
          undefined,
          true
        );
        continue;
      }

      if (response.ok) {
        const text = await response.text();
        return (text ? JSON.parse(text) : undefined) as T;
      }

      const detail = (await response.text().catch(() => '')).trim();
      const error = this.wrapError(method, endpoint, response.status, detail);
      if (!error.isRetryable) {
        throw error;
      }
      error.retryAfterMs = parseRetryAfterMs(response.headers.get('retry-after'));
      lastError = error;
    }

    throw lastError ?? new TrelloApiError(`Trello request ${method} /${endpoint} failed`);
  }

  private backoffDelay(attempt: number, lastError: TrelloApiError | null): number {
    const backoff = this.baseDelayMs * Math.pow(2, attempt);
    const retryAfter = lastError?.retryAfterMs ?? null;
    return retryAfter !== null ? Math.max(backoff, retryAfter) : backoff;
  }

  private wrapError(method: string, endpoint: string, status: number, detail: string): TrelloApiError {
    if (status === 401 || status === 403) {
      return new TrelloApiError('Trello rejected the API key or token', status);
    }
    const suffix = detail ? `: ${detail}` : '';
    return new TrelloApiError(
      `Trello API error (${status}) on ${method} /${endpoint}${suffix}`,
      status,
      isRetryableStatus(status)
    );
  }
}

/**
 * Create a Trello client with the provided credentials
 */
export function createTrelloClient(options: TrelloClientOptions): TrelloClient {
  if (!options.apiKey || !options.token) {
    throw new TrelloApiError('Trello API key and token are required');
  }
  return new TrelloClient(options);
}
