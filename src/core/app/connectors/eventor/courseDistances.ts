/**
 * Project: Eventor Client
 * File: src/core/app/connectors/eventor/courseDistances.ts
 * Summary: Extracts per-class course lengths from the public Eventor result page.
 *
 * The API has no course lengths, so they are read from the HTML result list. This follows
 * the current page layout (`.eventClassHeader > div > h3` followed by "2 100 m, ..." text)
 * and will stop finding classes when that layout changes.
 */

import { parse } from 'node-html-parser';

import { parseDistance } from './distance';

export type CourseDistanceExtraction = {
  /** Course length in metres keyed by class name, in page order. */
  distances: Map<string, number>;
  /** Classes whose header held no recognisable length. */
  unparsed: string[];
};

const normaliseText = (value: string) => value.replace(/\s+/g, ' ').trim();

export function extractCourseDistancesFromHtml(html: string): CourseDistanceExtraction {
  const root = parse(html, {
    lowerCaseTagName: false,
    blockTextElements: {
      script: true,
      style: true,
    },
  });

  const distances = new Map<string, number>();
  const unparsed: string[] = [];

  for (const header of root.querySelectorAll('.eventClassHeader')) {
    const block = header.querySelector('div');
    const heading = block?.querySelector('h3');
    if (!block || !heading) {
      continue;
    }

    const className = normaliseText(heading.text);
    if (!className) {
      continue;
    }

    heading.remove();
    const meters = parseDistance(block.text.trim());
    if (meters === null) {
      unparsed.push(className);
      continue;
    }

    distances.set(className, meters);
  }

  return { distances, unparsed };
}
