import { registerAs } from '@nestjs/config';

export default registerAs('polls', () => ({
  eventQueueSize: parseInt(process.env.POLL_EVENT_QUEUE_SIZE || '100', 10),
  mutationAttempts: parseInt(process.env.POLL_MUTATION_ATTEMPTS || '3', 10),
}));
