import { Injectable } from '@nestjs/common';
import * as dotenv from 'dotenv';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

@Injectable()
export class ConfigService {
  get mongoUri(): string {
    return process.env.MONGODB_URI || 'mongodb://localhost:27017/raffle-engine';
  }

  get port(): number {
    return parseInt(process.env.PORT || '3001', 10);
  }

  get nodeEnv(): string {
    return process.env.NODE_ENV || 'development';
  }

  get redisUrl(): string | undefined {
    return process.env.REDIS_URL || undefined;
  }

  /** How long before the draw date a closed raffle may already be drawn. */
  get drawBufferMs(): number {
    return intFromEnv('DRAW_BUFFER_MINUTES', 5) * 60 * 1000;
  }

  /** Attempts per ticket issuance when the raffle row changed underneath us. */
  get issueMaxAttempts(): number {
    return Math.max(1, intFromEnv('ISSUE_MAX_ATTEMPTS', 3));
  }

  get lockTtlMs(): number {
    return intFromEnv('LOCK_TTL_MS', 10000);
  }

  get lockWaitMs(): number {
    return intFromEnv('LOCK_WAIT_MS', 5000);
  }
}
