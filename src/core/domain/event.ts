/**
 * Project: Eventor Client
 * File: src/core/domain/event.ts
 * Summary: Event and race records as published by Eventor.
 */

export const Classification = {
  Championship: 1,
  National: 2,
  State: 3,
  Local: 4,
  Club: 5,
} as const;

export type Classification = (typeof Classification)[keyof typeof Classification];

export type DateAndTime = {
  /** Calendar date, e.g. `2025-05-14`. */
  readonly date: string;
  /** Wall clock time, e.g. `18:00:00`. */
  readonly clock?: string;
};

export type Position = {
  readonly x: number;
  readonly y: number;
  readonly unit: string;
};

export type EventRace = {
  readonly raceDistance?: string;
  readonly id: number;
  readonly eventId: number;
  readonly name?: string;
  readonly raceDate: DateAndTime;
  readonly position?: Position;
};

export type Event = {
  readonly id: number;
  readonly name: string;
  readonly classification: Classification;
  readonly statusId: number;
  readonly attributeId?: number;
  readonly disciplineId?: number;
  readonly startDate: string;
  readonly finishDate: DateAndTime;
  readonly organiserIds?: readonly number[];
  readonly races: readonly EventRace[];
};
