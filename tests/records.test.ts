import { describe, expect, it } from 'vitest';
import {
  buildMeeting,
  clampInt,
  normalizeAgendaItem,
  normalizeAnalyzedItem,
  toDecision,
  toStatus,
  toTopic
} from '../src/records.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('clampInt', () => {
  it('rounds and clamps numbers and numeric strings', () => {
    expect(clampInt(3.6, 1, 5, 1)).toBe(4);
    expect(clampInt('2', 1, 5, 1)).toBe(2);
    expect(clampInt(12, 1, 5, 1)).toBe(5);
    expect(clampInt(-9, -5, 5, 0)).toBe(-5);
  });

  it('falls back for values that are not numbers', () => {
    expect(clampInt('high', 1, 5, 1)).toBe(1);
    expect(clampInt(null, -5, 5, 0)).toBe(0);
    expect(clampInt(undefined, -5, 5, 0)).toBe(0);
  });
});

describe('enumerations', () => {
  it('maps topic spellings onto the fixed set', () => {
    expect(toTopic('Public Safety')).toBe('public_safety');
    expect(toTopic('public-safety')).toBe('public_safety');
    expect(toTopic('weather')).toBe('other');
    expect(toTopic(3)).toBe('other');
  });

  it('maps unknown status and decision to null', () => {
    expect(toStatus('Final Reading')).toBe('final_reading');
    expect(toStatus('tabled')).toBeNull();
    expect(toDecision('APPROVED')).toBe('approved');
    expect(toDecision(null)).toBeNull();
  });
});

describe('normalizeAgendaItem', () => {
  it('applies defaults to a bare item', () => {
    const item = normalizeAgendaItem({ item_id: '42-101', meeting_id: '42', title: 'Budget amendment' }, NOW);

    expect(item).toEqual({
      item_id: '42-101',
      meeting_id: '42',
      title: 'Budget amendment',
      meeting_date: '',
      created_at: '2026-03-01T12:00:00.000Z',
      topic: 'other',
      relevance: 1,
      summary: '',
      key_details: [],
      why_it_matters: '',
      status: null,
      decision: null,
      economic_axis: 0,
      social_axis: 0
    });
  });

  it('keeps provenance and the original created_at', () => {
    const item = normalizeAgendaItem(
      {
        item_id: '42-101',
        meeting_id: '42',
        title: 'Budget amendment',
        created_at: '2026-02-01T00:00:00.000Z',
        relevance: 0,
        analyzed_at: '2026-03-01T00:00:00.000Z',
        model_used: 'test-model'
      },
      NOW
    );

    expect(item.created_at).toBe('2026-02-01T00:00:00.000Z');
    expect(item.relevance).toBe(1);
    expect(item.analyzed_at).toBe('2026-03-01T00:00:00.000Z');
    expect(item.model_used).toBe('test-model');
  });

  it('assigns an id when none is given', () => {
    const item = normalizeAgendaItem({ meeting_id: '42', title: 'Budget amendment' }, NOW);

    expect(item.item_id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('normalizeAnalyzedItem', () => {
  it('keeps an echoed item id', () => {
    expect(normalizeAnalyzedItem({ item_id: ' 42-101 ', title: 'Budget' })?.item_id).toBe('42-101');
    expect(normalizeAnalyzedItem({ item_id: '', title: 'Budget' })).not.toHaveProperty('item_id');
  });

  it('drops items without a title', () => {
    expect(normalizeAnalyzedItem({ item_id: '42-101', title: '  ' })).toBeNull();
    expect(normalizeAnalyzedItem('Budget')).toBeNull();
  });
});

describe('buildMeeting', () => {
  it('defaults the body name', () => {
    const meeting = buildMeeting({ meeting_id: '42', body_name: '' }, NOW);

    expect(meeting.body_name).toBe('City Council');
    expect(meeting.created_at).toBe('2026-03-01T12:00:00.000Z');
  });
});
