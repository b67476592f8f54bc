// Active-stations XML feed parser

import { DOMParser } from '@xmldom/xmldom';

import type { Row } from '../types.js';
import { FeedParseError } from './fetcher.js';

const STATION_TAG = 'station';
const MISSING_FLAG = 'n';

const missing = (label: string) => `whew, no ${label}? how'd that happen`;

interface StationAttribute {
  name: string;
  required: boolean;
  fallback: string;
}

// Column order of a station row
export const STATION_ATTRIBUTES: readonly StationAttribute[] = [
  { name: 'id', required: false, fallback: missing('id') },
  { name: 'name', required: false, fallback: missing('name') },
  { name: 'lat', required: true, fallback: '' },
  { name: 'lon', required: true, fallback: '' },
  { name: 'pgm', required: false, fallback: missing('pgm') },
  { name: 'type', required: false, fallback: missing('kind') },
  { name: 'met', required: false, fallback: MISSING_FLAG },
  { name: 'currents', required: false, fallback: MISSING_FLAG },
  { name: 'waterquality', required: false, fallback: MISSING_FLAG },
  { name: 'dart', required: false, fallback: MISSING_FLAG },
];

function stationToRow(station: Element, position: number): Row {
  return STATION_ATTRIBUTES.map(({ name, required, fallback }) => {
    if (station.hasAttribute(name)) {
      return station.getAttribute(name) ?? fallback;
    }
    if (required) {
      const id = station.hasAttribute('id') ? station.getAttribute('id') : `#${position + 1}`;
      throw new FeedParseError(`Station ${id} is missing required attribute "${name}"`);
    }
    return fallback;
  });
}

/**
 * Parse the active-stations document into one row per `<station>` element.
 * Malformed XML and stations without `lat`/`lon` are fatal.
 */
export function parseStations(body: string): Row[] {
  const problems: string[] = [];
  const collect = (message: string) => {
    problems.push(message);
  };

  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: collect,
      fatalError: collect,
    },
  });

  const doc = parser.parseFromString(body, 'text/xml');

  if (problems.length > 0) {
    throw new FeedParseError(`Malformed stations document: ${problems[0]}`);
  }
  if (!doc || !doc.documentElement) {
    throw new FeedParseError('Malformed stations document: no root element');
  }

  const stations = doc.getElementsByTagName(STATION_TAG);
  const rows: Row[] = [];
  for (let i = 0; i < stations.length; i++) {
    const station = stations.item(i);
    if (station) {
      rows.push(stationToRow(station, i));
    }
  }
  return rows;
}
