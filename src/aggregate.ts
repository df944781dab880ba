/**
 * Dashboard Aggregation
 *
 * Turns raw sheet rows into the summary counts, chart series and table rows
 * the dashboard renders. One sheet row is one school registration carrying
 * up to N students; the detailed table gets one record per named student.
 */

import type { ColumnMapping } from "./column-mapping";

/** Placeholder for a cell the mapping or the row does not provide */
export const MISSING = "N/A";

/** First option of every filter select */
export const ALL_OPTION = "All";

/** Number of bars kept in the ranked charts */
export const TOP_N = 10;

/**
 * Labels and values of one chart
 */
export interface ChartSeries {
  labels: string[];
  data: number[];
}

/**
 * Chart series with a percentage label per slice
 */
export interface PercentageSeries extends ChartSeries {
  percentages: string[];
}

/**
 * Registered schools per municipality
 */
export interface SchoolMunicipalityRow {
  municipality: string;
  schoolName: string;
  total: number;
}

/**
 * One student's row in the detailed table
 */
export interface DetailedRecord {
  id: string;
  timestamp: string;
  municipality: string;
  schoolLevel: string;
  schoolName: string;
  studentName: string;
  gender: string;
  age: string;
  discipline: string;
  topic: string;
  documents: string;
}

/**
 * Everything the rendered dashboard needs
 */
export interface DashboardData {
  totalMunicipality: number;
  totalGender: number;
  totalDiscipline: number;
  totalTopic: number;
  genderChart: PercentageSeries;
  ageChart: ChartSeries;
  ageDistribution: Record<string, number>;
  schoolLevelChart: ChartSeries;
  schoolLevelCounts: Record<string, number>;
  municipalityChart: ChartSeries;
  municipalityTopChart: ChartSeries;
  disciplineChart: ChartSeries;
  disciplineCounts: Record<string, number>;
  schoolMunicipalityTable: SchoolMunicipalityRow[];
  schoolLevelOptions: string[];
  municipalityOptions: string[];
  detailedRecords: DetailedRecord[];
}

/**
 * Returns the trimmed cell, or MISSING when the column is unmapped or the
 * row is too short. The Sheets API drops trailing empty cells, so short rows
 * are normal.
 */
export function cellAt(row: readonly string[], index: number | undefined): string {
  if (index === undefined || row.length <= index) {
    return MISSING;
  }
  return String(row[index] ?? "").trim();
}

function isPresent(value: string): boolean {
  return value !== "" && value !== MISSING;
}

// Decimal notation only: digits may be grouped with "_", no hex or binary.
const DECIMAL_PATTERN =
  /^[+-]?(?:\d+(?:_\d+)*(?:\.(?:\d+(?:_\d+)*)?)?|\.\d+(?:_\d+)*)(?:[eE][+-]?\d+(?:_\d+)*)?$/;

/**
 * Parses an age cell the way a spreadsheet user types it ("12", "12.0").
 * Fractions are truncated.
 */
export function parseAge(value: string): number | undefined {
  if (!isPresent(value) || !DECIMAL_PATTERN.test(value)) {
    return undefined;
  }
  const parsed = parseFloat(value.replace(/_/g, ""));
  return Number.isFinite(parsed) ? Math.trunc(parsed) : undefined;
}

/**
 * Formats a percentage with one decimal. Values exactly halfway between two
 * tenths round to the even tenth; `toFixed` would round them up.
 */
export function formatPercentage(value: number): string {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    // value is k + 0.25 or k + 0.75, exactly between two tenths
    const lower = Math.floor(value * 10);
    const tenths = lower % 2 === 0 ? lower : lower + 1;
    return `${Math.floor(tenths / 10)}.${tenths % 10}%`;
  }
  return `${value.toFixed(1)}%`;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function sortedSeries(counts: Map<string, number>): ChartSeries {
  const labels = [...counts.keys()].sort();
  return { labels, data: labels.map((label) => counts.get(label) ?? 0) };
}

/**
 * Highest counts first; ties keep the order in which labels were first seen.
 */
function topSeries(counts: Map<string, number>, limit: number): ChartSeries {
  const ranked = [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
  return {
    labels: ranked.map(([label]) => label),
    data: ranked.map(([, count]) => count),
  };
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function filterOptions(values: string[]): string[] {
  return [ALL_OPTION, ...[...new Set(values)].sort()];
}

/**
 * The shape returned for an empty sheet.
 */
export function emptyDashboardData(): DashboardData {
  return {
    totalMunicipality: 0,
    totalGender: 0,
    totalDiscipline: 0,
    totalTopic: 0,
    genderChart: { labels: [], data: [], percentages: [] },
    ageChart: { labels: [], data: [] },
    ageDistribution: {},
    schoolLevelChart: { labels: [], data: [] },
    schoolLevelCounts: {},
    municipalityChart: { labels: [], data: [] },
    municipalityTopChart: { labels: [], data: [] },
    disciplineChart: { labels: [], data: [] },
    disciplineCounts: {},
    schoolMunicipalityTable: [],
    schoolLevelOptions: [ALL_OPTION],
    municipalityOptions: [ALL_OPTION],
    detailedRecords: [],
  };
}

/**
 * Aggregates sheet rows (header excluded) into dashboard data.
 *
 * @param rows - Data rows as returned by the Sheets API
 * @param mapping - Column indices of each field
 */
export function aggregateRows(
  rows: readonly string[][],
  mapping: ColumnMapping,
): DashboardData {
  if (rows.length === 0) {
    return emptyDashboardData();
  }

  const municipalityCounts = new Map<string, number>();
  const disciplineCounts = new Map<string, number>();
  const schoolLevelCounts = new Map<string, number>();
  const genderCounts = new Map<string, number>();
  const ageCounts = new Map<number, number>();
  const topics = new Set<string>();
  // municipality -> school name -> registrations
  const schoolsByMunicipality = new Map<string, Map<string, number>>();
  const detailedRecords: DetailedRecord[] = [];

  rows.forEach((row, i) => {
    const timestamp = cellAt(row, mapping.timestamp);
    const municipality = cellAt(row, mapping.municipality);
    const schoolLevel = cellAt(row, mapping.schoolLevel);
    const schoolName = cellAt(row, mapping.schoolName);
    const discipline = cellAt(row, mapping.discipline);
    const topic = cellAt(row, mapping.topic);
    const documents = cellAt(row, mapping.documents);

    if (isPresent(municipality)) increment(municipalityCounts, municipality);
    if (isPresent(discipline)) increment(disciplineCounts, discipline);
    if (isPresent(topic)) topics.add(topic);
    if (isPresent(schoolLevel)) increment(schoolLevelCounts, schoolLevel);

    if (municipality !== MISSING && schoolName !== MISSING) {
      let schools = schoolsByMunicipality.get(municipality);
      if (!schools) {
        schools = new Map();
        schoolsByMunicipality.set(municipality, schools);
      }
      increment(schools, schoolName);
    }

    mapping.students.forEach((columns, slot) => {
      const studentName = row.length > columns.name ? cellAt(row, columns.name) : "";
      if (!studentName) {
        return;
      }
      const gender = columns.gender === undefined ? "" : cellAt(row, columns.gender);
      const ageCell = columns.age === undefined ? "" : cellAt(row, columns.age);
      const normalizedGender = gender === MISSING ? "" : gender;
      const normalizedAge = ageCell === MISSING ? "" : ageCell;

      if (normalizedGender) increment(genderCounts, normalizedGender);
      const age = parseAge(normalizedAge);
      if (age !== undefined) {
        ageCounts.set(age, (ageCounts.get(age) ?? 0) + 1);
      }

      detailedRecords.push({
        id: `${i}-${slot + 1}`,
        timestamp,
        municipality,
        schoolLevel,
        schoolName,
        studentName,
        gender: normalizedGender || MISSING,
        age: normalizedAge || MISSING,
        discipline,
        topic,
        documents,
      });
    });
  });

  const genderSeries = sortedSeries(genderCounts);
  const totalGender = genderSeries.data.reduce((sum, n) => sum + n, 0);
  const percentages =
    totalGender > 0
      ? genderSeries.data.map((n) => formatPercentage((n / totalGender) * 100))
      : [];

  const ages = [...ageCounts.keys()].sort((a, b) => a - b);

  const schoolMunicipalityTable: SchoolMunicipalityRow[] = [];
  for (const [municipality, schools] of schoolsByMunicipality) {
    for (const [schoolName, total] of schools) {
      schoolMunicipalityTable.push({ municipality, schoolName, total });
    }
  }
  schoolMunicipalityTable.sort(
    (a, b) =>
      compareStrings(a.municipality, b.municipality) ||
      compareStrings(a.schoolName, b.schoolName),
  );

  return {
    totalMunicipality: municipalityCounts.size,
    totalGender,
    totalDiscipline: disciplineCounts.size,
    totalTopic: topics.size,
    genderChart: { ...genderSeries, percentages },
    ageChart: {
      labels: ages.map(String),
      data: ages.map((age) => ageCounts.get(age) ?? 0),
    },
    ageDistribution: Object.fromEntries(
      ages.map((age) => [String(age), ageCounts.get(age) ?? 0]),
    ),
    schoolLevelChart: sortedSeries(schoolLevelCounts),
    schoolLevelCounts: Object.fromEntries(schoolLevelCounts),
    municipalityChart: sortedSeries(municipalityCounts),
    municipalityTopChart: topSeries(municipalityCounts, TOP_N),
    disciplineChart: topSeries(disciplineCounts, TOP_N),
    disciplineCounts: Object.fromEntries(disciplineCounts),
    schoolMunicipalityTable,
    schoolLevelOptions: filterOptions(detailedRecords.map((r) => r.schoolLevel)),
    municipalityOptions: filterOptions(
      detailedRecords.map((r) => r.municipality),
    ),
    detailedRecords,
  };
}
