import type { ExamEvent } from '@gradebook/data';

export function formatExamEvent(event: ExamEvent): string {
  const notes = event.notes ? `  ${event.notes}` : '';
  return `#${event.id}  ${event.date}  ${event.name}${notes}`;
}

/**
 * Shape of one event in the JSON envelope.
 */
export function toExamEventJson(event: ExamEvent) {
  return {
    id: event.id,
    name: event.name,
    notes: event.notes,
    date: event.date,
    createdAt: event.createdAt.toISOString(),
  };
}
