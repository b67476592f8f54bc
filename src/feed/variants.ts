// Feed variants: what to fetch, how to parse it, how to lay it out

import type { BuoytermConfig, ColumnSpec, FeedKind, FeedVariant } from '../types.js';
import { parseObservations } from './parse-observations.js';
import { parseStations } from './parse-stations.js';

const OBSERVATION_HEADERS = [
  'stn', 'lat', 'lon', 'year', 'mo', 'day', 'hr', 'min', 'wdir', 'wspd', 'gst',
  'wvht', 'dpd', 'apd', 'mwd', 'pres', 'ptdy', 'atmp', 'wtmp', 'dewp', 'vis', 'tide',
];

export const OBSERVATION_COLUMNS: ColumnSpec[] = OBSERVATION_HEADERS.map((header, index) => ({
  header,
  width: index === 0 ? 6 : index < 3 ? 7 : 4,
}));

export const STATION_COLUMNS: ColumnSpec[] = [
  { header: 'station', width: 7 },
  { header: 'name', width: 28 },
  { header: 'lat', width: 7 },
  { header: 'lon', width: 8 },
  { header: 'program', width: 20 },
  { header: 'kind', width: 10 },
  { header: 'met', width: 4 },
  { header: 'currents', width: 6 },
  { header: 'water quality', width: 6 },
  { header: 'dart', width: 4 },
];

export function getFeedVariant(kind: FeedKind, config: BuoytermConfig): FeedVariant {
  switch (kind) {
    case 'observations':
      return {
        kind,
        title: 'Latest Observations',
        url: config.feeds.observationsUrl,
        columns: OBSERVATION_COLUMNS,
        parse: parseObservations,
      };
    case 'stations':
      return {
        kind,
        title: 'Active Stations',
        url: config.feeds.stationsUrl,
        columns: STATION_COLUMNS,
        parse: parseStations,
      };
  }
}
