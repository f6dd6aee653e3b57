import type { FilterQuery, UpdateQuery } from 'mongoose';
import { OrderModel, type IOrder } from '../models';
import { ORDER_STATES } from '../config/constants';
import type { Order } from '../types/domain';
import { canTransition } from '../services/orders/orderStates';
import { InvalidTransitionError } from '../utils/errors';
import type {
  OrderChange,
  OrderGuard,
  OrderListFilter,
  OrderRepository,
  PaymentCandidateQuery,
} from './types';

const LEAN_PROJECTION = { _id: 0, __v: 0 } as const;

const OPEN_STATES = [ORDER_STATES.CREATED, ORDER_STATES.AWAITING_PAYMENT];
const PROVISIONABLE_STATES = [ORDER_STATES.PAYMENT_CONFIRMED, ORDER_STATES.PROVISIONING];

export class MongoOrderRepository implements OrderRepository {
  async insert(order: Order): Promise<Order> {
    await OrderModel.create(order);
    return order;
  }

  async findById(orderId: string): Promise<Order | null> {
    return OrderModel.findOne({ orderId }, LEAN_PROJECTION).lean<Order | null>().exec();
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<Order | null> {
    return OrderModel.findOne({ idempotencyKey }, LEAN_PROJECTION).lean<Order | null>().exec();
  }

  async compareAndSet(orderId: string, guard: OrderGuard, change: OrderChange): Promise<Order | null> {
    const filter: FilterQuery<IOrder> = { orderId };

    if (change.transition) {
      if (!canTransition(change.transition.from, change.transition.to)) {
        throw new InvalidTransitionError(orderId, change.transition.from, change.transition.to);
      }
      if (!guard.states.includes(change.transition.from)) {
        return null;
      }
      filter.state = change.transition.from;
    } else {
      filter.state = { $in: [...guard.states] };
    }
    if (guard.attempts !== undefined) {
      filter['provisioning.attempts'] = guard.attempts;
    }
    if (guard.dueBy) {
      filter['provisioning.nextAttemptAt'] = { $lte: guard.dueBy };
    }

    const update: UpdateQuery<IOrder> = { $set: { ...change.set } };
    if (change.transition) {
      update.$set = { ...change.set, state: change.transition.to };
      update.$push = {
        history: {
          from: change.transition.from,
          to: change.transition.to,
          at: change.at,
          reason: change.reason,
        },
      };
    }

    return OrderModel.findOneAndUpdate(filter, update, {
      new: true,
      projection: LEAN_PROJECTION,
      runValidators: true,
    })
      .lean<Order | null>()
      .exec();
  }

  async findPaymentCandidates(query: PaymentCandidateQuery): Promise<Order[]> {
    return OrderModel.find(
      {
        'payment.provider': query.provider,
        state: { $in: OPEN_STATES },
        'payment.expectedAmount': {
          $gte: query.amount - query.tolerance,
          $lte: query.amount + query.tolerance,
        },
        createdAt: { $lte: query.at },
        expiresAt: { $gte: query.at },
      },
      LEAN_PROJECTION
    )
      .limit(10)
      .lean<Order[]>()
      .exec();
  }

  async findExpirable(now: Date, limit: number): Promise<Order[]> {
    return OrderModel.find({ state: { $in: OPEN_STATES }, expiresAt: { $lte: now } }, LEAN_PROJECTION)
      .sort({ expiresAt: 1 })
      .limit(limit)
      .lean<Order[]>()
      .exec();
  }

  async findProvisioningDue(now: Date, limit: number): Promise<Order[]> {
    return OrderModel.find(
      {
        state: { $in: PROVISIONABLE_STATES },
        'provisioning.nextAttemptAt': { $lte: now },
      },
      LEAN_PROJECTION
    )
      .sort({ 'provisioning.nextAttemptAt': 1 })
      .limit(limit)
      .lean<Order[]>()
      .exec();
  }

  async findSettlementPending(limit: number): Promise<Order[]> {
    return OrderModel.find({ state: ORDER_STATES.FULFILLED, settlementPending: true }, LEAN_PROJECTION)
      .sort({ updatedAt: 1 })
      .limit(limit)
      .lean<Order[]>()
      .exec();
  }

  async findNotificationPending(now: Date, limit: number): Promise<Order[]> {
    return OrderModel.find(
      { notificationPending: true, $or: [{ nextNotifyAt: null }, { nextNotifyAt: { $lte: now } }] },
      LEAN_PROJECTION
    )
      .sort({ nextNotifyAt: 1, updatedAt: 1 })
      .limit(limit)
      .lean<Order[]>()
      .exec();
  }

  async list(filter: OrderListFilter): Promise<Order[]> {
    const query: FilterQuery<IOrder> = {};
    if (filter.state) {
      query.state = filter.state;
    }
    if (filter.buyerId) {
      query.buyerId = filter.buyerId;
    }

    return OrderModel.find(query, LEAN_PROJECTION)
      .sort({ createdAt: -1 })
      .skip(filter.skip ?? 0)
      .limit(filter.limit ?? 50)
      .lean<Order[]>()
      .exec();
  }
}

export const orderRepository = new MongoOrderRepository();
