import { config } from '../../../config/env';
import type { PaymentProvider } from '../../../config/constants';
import type { IPaymentGateway } from '../IPaymentGateway';
import { CryptobotGateway } from './cryptobotGateway';
import { HeleketGateway } from './heleketGateway';
import { TonGateway } from './tonGateway';
import { YookassaGateway } from './yookassaGateway';

export type GatewayRegistry = Record<PaymentProvider, IPaymentGateway>;

export const createGatewayRegistry = (
  settings = config.payments,
  amountTolerance = config.orders.amountTolerance
): GatewayRegistry => ({
  yookassa: new YookassaGateway(settings.yookassa),
  cryptobot: new CryptobotGateway(settings.cryptobot.apiToken),
  heleket: new HeleketGateway(settings.heleket.apiKey),
  ton: new TonGateway({ ...settings.ton, amountTolerance }),
});

export { CryptobotGateway, HeleketGateway, TonGateway, YookassaGateway };
