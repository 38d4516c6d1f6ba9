/**
 * Account balance endpoint.
 */

import { RequesterProtocol } from '../client-types';
import { Balance, BalanceSchema } from '../types';

export class CashAPI {
  constructor(private requester: RequesterProtocol) {}

  async getBalance(): Promise<Balance> {
    return this.requester.get('cash/v1/balance', undefined, BalanceSchema);
  }
}
