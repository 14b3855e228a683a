import type { Column, Dataset, HubMessage, Insight, InsightCategory, Subscriber } from '@/types/insights';

export function numeric(name: string, values: (number | null)[]): Column {
  return { name, type: 'numeric', values };
}

export function text(name: string, values: (string | null)[]): Column {
  return { name, type: 'text', values };
}

export function dataset(...columns: Column[]): Dataset {
  const rowCount = columns.reduce((max, c) => Math.max(max, c.values.length), 0);
  return { rowCount, columns };
}

export function makeInsight(
  title: string,
  confidence: number,
  category: InsightCategory = 'statistical',
): Insight {
  return { title, description: `${title} description`, confidence, category, affectedColumns: [], affectedRows: [] };
}

/** Subscriber that records every message it receives. */
export class RecordingSubscriber implements Subscriber {
  readonly messages: HubMessage[] = [];

  constructor(readonly id: string) {}

  deliver(message: HubMessage): void {
    this.messages.push(message);
  }

  types(): string[] {
    return this.messages.map((m) => m.type);
  }
}

/** Subscriber whose connection is gone. */
export class DeadSubscriber implements Subscriber {
  attempts = 0;

  constructor(readonly id: string) {}

  deliver(): void {
    this.attempts++;
    throw new Error('connection closed');
  }
}
