import { ORDER_STATES, type OrderState } from '../../config/constants';

const S = ORDER_STATES;

/** Allowed moves. Every edge goes forward; terminal states have none. */
export const ORDER_TRANSITIONS: Readonly<Record<OrderState, readonly OrderState[]>> = {
  [S.CREATED]: [S.AWAITING_PAYMENT, S.EXPIRED],
  [S.AWAITING_PAYMENT]: [S.PAYMENT_CONFIRMED, S.EXPIRED],
  [S.PAYMENT_CONFIRMED]: [S.PROVISIONING],
  [S.PROVISIONING]: [S.FULFILLED, S.FAILED],
  [S.FULFILLED]: [S.REFUNDED],
  [S.EXPIRED]: [],
  [S.FAILED]: [],
  [S.REFUNDED]: [],
};

// Position in the partial order; side branches share a rank with their sibling
const STATE_RANK: Readonly<Record<OrderState, number>> = {
  [S.CREATED]: 0,
  [S.AWAITING_PAYMENT]: 1,
  [S.PAYMENT_CONFIRMED]: 2,
  [S.PROVISIONING]: 3,
  [S.EXPIRED]: 4,
  [S.FAILED]: 4,
  [S.FULFILLED]: 4,
  [S.REFUNDED]: 5,
};

export const canTransition = (from: OrderState, to: OrderState): boolean => ORDER_TRANSITIONS[from].includes(to);

export const stateRank = (state: OrderState): number => STATE_RANK[state];

/** Payment was taken: the order is at or past `payment_confirmed` on the main path. */
export const isPaid = (state: OrderState): boolean =>
  state === S.PAYMENT_CONFIRMED ||
  state === S.PROVISIONING ||
  state === S.FULFILLED ||
  state === S.FAILED ||
  state === S.REFUNDED;

export const OPEN_ORDER_STATES: readonly OrderState[] = [S.CREATED, S.AWAITING_PAYMENT];
