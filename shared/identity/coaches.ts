import type { PulseContext } from '../core/context';
import { coachKey } from '../core/keys';
import { fail, ok, type CoreResult } from '../core/result';
import type { Logger } from '../telemetry/logger';
import { canonicalize } from './canonical';
import { CoachAccountSchema, type CoachAccount } from './types';

/** Coach accounts share canonicalization with athletes but live in their own key space. */
export class CoachAccounts {
  private readonly ctx: PulseContext;

  private readonly log: Logger;

  constructor(ctx: PulseContext) {
    this.ctx = ctx;
    this.log = ctx.logger.child('coaches');
  }

  private load(key: string): CoachAccount | null {
    return this.ctx.store.get(coachKey(key), CoachAccountSchema, null);
  }

  register(raw: string, pin: string, confirmPin?: string): CoreResult<CoachAccount> {
    const key = canonicalize(raw);
    if (!key || !pin) {
      return fail('InvalidInput', 'identity and pin are required');
    }
    if (confirmPin !== undefined && confirmPin !== pin) {
      return fail('InvalidInput', 'pin confirmation does not match');
    }
    if (this.load(key)) {
      return fail('AlreadyExists', 'coach already registered', { identity: key });
    }
    const account: CoachAccount = { identity: key, pin, createdAt: this.ctx.now().toISOString() };
    const saved = this.ctx.store.put(coachKey(key), account);
    if (!saved.ok) {
      return saved;
    }
    this.log.info('coach registered', { identity: key });
    return ok(account);
  }

  authenticate(raw: string, pin: string): CoreResult<CoachAccount> {
    const key = canonicalize(raw);
    if (!key) {
      return fail('InvalidInput', 'identity is required');
    }
    const account = this.load(key);
    if (!account) {
      return fail('NotFound', 'coach not found', { identity: key });
    }
    if (account.pin !== pin) {
      return fail('InvalidInput', 'pin does not match', { identity: key });
    }
    return ok(account);
  }

  get(raw: string): CoreResult<CoachAccount> {
    const key = canonicalize(raw);
    const account = key ? this.load(key) : null;
    return account ? ok(account) : fail('NotFound', 'coach not found', { identity: key });
  }
}
