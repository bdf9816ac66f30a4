import type { PulseContext } from '../core/context';
import { STAFFROOM_KEY } from '../core/keys';
import { fail, ok, type CoreResult } from '../core/result';
import { normalizeCode } from '../codes/registry';
import type { CoachAccounts } from '../identity/coaches';
import {
  StaffroomBoardSchema,
  type ListMessagesOptions,
  type StaffroomBoard,
  type StaffroomMessage,
} from './types';

export const DEFAULT_MESSAGE_LIMIT = 80;

const EMPTY_BOARD: StaffroomBoard = { messages: [] };

/** Coach-to-coach message board, optionally tagged with a team code. */
export class Staffroom {
  private readonly ctx: PulseContext;

  private readonly coaches: CoachAccounts;

  constructor(ctx: PulseContext, coaches: CoachAccounts) {
    this.ctx = ctx;
    this.coaches = coaches;
  }

  private board(): StaffroomBoard {
    return this.ctx.store.get(STAFFROOM_KEY, StaffroomBoardSchema, EMPTY_BOARD);
  }

  /** The board position makes ids unique even when clock and random source repeat. */
  private createId(postedAt: string, position: number): string {
    const suffix = Math.floor(this.ctx.random() * 36 ** 6)
      .toString(36)
      .padStart(6, '0');
    return `${postedAt}:${position}:${suffix}`;
  }

  post(coach: string, text: string, teamCode?: string): CoreResult<StaffroomMessage> {
    const author = this.coaches.get(coach);
    if (!author.ok) {
      return author;
    }
    const body = typeof text === 'string' ? text.trim() : '';
    if (!body) {
      return fail('InvalidInput', 'message text is required');
    }
    const board = this.board();
    const postedAt = this.ctx.now().toISOString();
    const message: StaffroomMessage = {
      id: this.createId(postedAt, board.messages.length),
      author: author.value.identity,
      teamCode: normalizeCode(teamCode) || null,
      text: body,
      postedAt,
    };
    const saved = this.ctx.store.put(STAFFROOM_KEY, { messages: [...board.messages, message] });
    if (!saved.ok) {
      return saved;
    }
    this.ctx.logger.debug('staffroom message posted', { author: message.author, teamCode: message.teamCode });
    return ok(message);
  }

  /** Newest first, limited to the most recent `limit` posts before filtering. */
  list(options: ListMessagesOptions = {}): StaffroomMessage[] {
    const limit =
      typeof options.limit === 'number' && Number.isInteger(options.limit) && options.limit > 0
        ? options.limit
        : DEFAULT_MESSAGE_LIMIT;
    const filter = normalizeCode(options.teamCode);
    return this.board()
      .messages.slice(-limit)
      .reverse()
      .filter((message) => !filter || message.teamCode === filter);
  }
}
