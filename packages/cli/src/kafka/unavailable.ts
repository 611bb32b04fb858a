import type { ConsumerGateway, ProducerGateway } from '@avrodeck/engine';
import { KafkaNotConfiguredError } from '../errors.js';

/** Broker gateways for profiles without bootstrap servers */
export const unavailableProducer: ProducerGateway = {
  publish: async () => {
    throw new KafkaNotConfiguredError();
  },
};

export const unavailableConsumer: ConsumerGateway = {
  open: async () => {
    throw new KafkaNotConfiguredError();
  },
  fetch: async () => {
    throw new KafkaNotConfiguredError();
  },
  close: async () => {},
};
