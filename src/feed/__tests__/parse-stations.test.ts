import { describe, it, expect } from 'vitest';
import { parseStations, STATION_ATTRIBUTES } from '../parse-stations.js';
import { FeedParseError } from '../fetcher.js';

function stationsDoc(...stations: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n<stations created="2026-10-19T12:00:00UTC" count="${stations.length}">\n${stations.join('\n')}\n</stations>`;
}

const FULL_STATION =
  '<station id="41001" lat="34.7" lon="-72.7" name="EAST HATTERAS" owner="NDBC" pgm="NDBC Meteorological/Ocean" type="buoy" met="y" currents="n" waterquality="n" dart="n"/>';

describe('parseStations', () => {
  it('should extract the station attributes in column order', () => {
    expect(parseStations(stationsDoc(FULL_STATION))).toEqual([
      ['41001', 'EAST HATTERAS', '34.7', '-72.7', 'NDBC Meteorological/Ocean', 'buoy', 'y', 'n', 'n', 'n'],
    ]);
  });

  it('should produce ten fields per station', () => {
    expect(STATION_ATTRIBUTES).toHaveLength(10);
    const rows = parseStations(stationsDoc(FULL_STATION, '<station id="x" lat="1" lon="2"/>'));
    expect(rows.map(row => row.length)).toEqual([10, 10]);
  });

  it('should fill a missing met flag with "n"', () => {
    const rows = parseStations(
      stationsDoc('<station id="46050" lat="44.6" lon="-124.5" name="STONEWALL BANK" pgm="NDBC" type="buoy" currents="y" waterquality="n" dart="n"/>')
    );
    expect(rows[0][6]).toBe('n');
    expect(rows[0][7]).toBe('y');
  });

  it('should use placeholders for missing descriptive attributes', () => {
    const rows = parseStations(stationsDoc('<station lat="10.0" lon="20.0"/>'));
    expect(rows).toEqual([
      [
        "whew, no id? how'd that happen",
        "whew, no name? how'd that happen",
        '10.0',
        '20.0',
        "whew, no pgm? how'd that happen",
        "whew, no kind? how'd that happen",
        'n',
        'n',
        'n',
        'n',
      ],
    ]);
  });

  it('should keep an attribute that is present but empty', () => {
    const rows = parseStations(stationsDoc('<station id="a1" name="" lat="1" lon="2"/>'));
    expect(rows[0][1]).toBe('');
  });

  it('should fail when a station has no lat', () => {
    const body = stationsDoc(FULL_STATION, '<station id="51000" lon="-153.9" name="NORTHERN HAWAII"/>');
    expect(() => parseStations(body)).toThrow(FeedParseError);
    expect(() => parseStations(body)).toThrow('Station 51000 is missing required attribute "lat"');
  });

  it('should fail when a station has no lon, naming it by position without an id', () => {
    const body = stationsDoc(FULL_STATION, '<station lat="1.0"/>');
    expect(() => parseStations(body)).toThrow('Station #2 is missing required attribute "lon"');
  });

  it('should return no rows when there are no station elements', () => {
    expect(parseStations('<stations count="0"></stations>')).toEqual([]);
  });

  it('should fail on an empty document', () => {
    expect(() => parseStations('')).toThrow(FeedParseError);
  });
});
