/**
 * Shared test data and in-process stand-ins for the source API and the model
 */

import type { SourceClient } from '../src/legistar.js';
import type { ModelClient } from '../src/analyze.js';
import type { LegistarEvent, LegistarEventItem } from '../src/types.js';

export const SAMPLE_EVENT: LegistarEvent = {
  EventId: 42,
  EventBodyName: 'City Council',
  EventDate: '2026-02-23T00:00:00',
  EventTime: '6:00 PM',
  EventLocation: 'Council Chambers',
  EventInSiteURL: 'https://example.legistar.com/MeetingDetail.aspx?ID=42',
  EventAgendaFile: 'https://example.legistar.com/View.ashx?M=A&ID=42',
  EventMinutesFile: null
};

export const SAMPLE_ITEMS: LegistarEventItem[] = [
  { EventItemId: 101, EventItemTitle: 'Rezoning of North Monroe corridor' },
  { EventItemId: 102, EventItemTitle: 'Approval of consent agenda' },
  { EventItemId: 103, EventItemTitle: '   ' }
];

export class FakeSource implements SourceClient {
  readonly itemRequests: number[] = [];

  constructor(
    private readonly events: LegistarEvent[],
    private readonly items: Record<number, LegistarEventItem[]> = {},
    private readonly failures: { events?: Error; items?: Error } = {}
  ) {}

  async listEvents(): Promise<LegistarEvent[]> {
    if (this.failures.events) throw this.failures.events;
    return this.events;
  }

  async listEventItems(eventId: number): Promise<LegistarEventItem[]> {
    this.itemRequests.push(eventId);
    if (this.failures.items) throw this.failures.items;
    return this.items[eventId] ?? [];
  }
}

export function sampleSource(): FakeSource {
  return new FakeSource([SAMPLE_EVENT], { 42: SAMPLE_ITEMS });
}

export class FakeModelClient implements ModelClient {
  readonly model = 'test-model';
  readonly prompts: string[] = [];

  constructor(private readonly reply: string | Error) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}
