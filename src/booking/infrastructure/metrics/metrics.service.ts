import { Injectable } from '@nestjs/common';
import { BookingFailureReason } from '../../domain/types/booking-failure.type';

export type CancellationType = 'soft' | 'hard';

@Injectable()
export class MetricsService {
  private reservationsCreated = 0;
  private softCancellations = 0;
  private hardCancellations = 0;
  private rejections = new Map<BookingFailureReason, number>();
  private lockTimeouts = 0;

  // Arrays to store timing measurements
  private assignmentTimes: number[] = [];
  private lockWaitTimes: number[] = [];

  // Maximum samples to keep in memory
  private readonly MAX_SAMPLES = 1000;

  /**
   * Resets all in-memory counters and samples.
   * Intended for test isolation since this service is stateful.
   */
  reset(): void {
    this.reservationsCreated = 0;
    this.softCancellations = 0;
    this.hardCancellations = 0;
    this.rejections.clear();
    this.lockTimeouts = 0;
    this.assignmentTimes = [];
    this.lockWaitTimes = [];
  }

  recordReservationCreated(): void {
    this.reservationsCreated++;
  }

  recordReservationCancelled(type: CancellationType): void {
    if (type === 'soft') {
      this.softCancellations++;
    } else {
      this.hardCancellations++;
    }
  }

  recordRejection(reason: BookingFailureReason): void {
    this.rejections.set(reason, (this.rejections.get(reason) ?? 0) + 1);
  }

  recordAssignmentTime(ms: number): void {
    this.addSample(this.assignmentTimes, ms);
  }

  recordLockWaitTime(ms: number): void {
    this.addSample(this.lockWaitTimes, ms);
  }

  recordLockTimeout(): void {
    this.lockTimeouts++;
  }

  getMetrics(): {
    reservations: {
      created: number;
      cancelled: { soft: number; hard: number };
      rejections: Partial<Record<BookingFailureReason, number>>;
    };
    assignmentTime: {
      p95: number | null;
      samples: number;
    };
    locks: {
      waitTimes: {
        p95: number | null;
        samples: number;
      };
      timeouts: number;
    };
  } {
    const rejections: Partial<Record<BookingFailureReason, number>> = {};
    for (const [reason, count] of this.rejections) {
      rejections[reason] = count;
    }

    return {
      reservations: {
        created: this.reservationsCreated,
        cancelled: {
          soft: this.softCancellations,
          hard: this.hardCancellations,
        },
        rejections,
      },
      assignmentTime: {
        p95: this.calculateP95(this.assignmentTimes),
        samples: this.assignmentTimes.length,
      },
      locks: {
        waitTimes: {
          p95: this.calculateP95(this.lockWaitTimes),
          samples: this.lockWaitTimes.length,
        },
        timeouts: this.lockTimeouts,
      },
    };
  }

  private addSample(array: number[], value: number): void {
    array.push(value);
    if (array.length > this.MAX_SAMPLES) {
      array.shift();
    }
  }

  private calculateP95(values: number[]): number | null {
    if (values.length < 20) {
      // Insufficient data for a meaningful P95
      return null;
    }

    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[index];
  }
}
