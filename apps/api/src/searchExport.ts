import ExcelJS from 'exceljs';
import type { StoredSearchWithLocations } from './repositories/searchHistoryRepository.js';
import type { ContactCompleteness, FootTraffic, ScoredCandidate } from './types.js';

export const EXPORT_FORMATS = ['csv', 'xlsx'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

const FOOT_TRAFFIC_LABELS: Record<FootTraffic, string> = {
  very_low: 'Very Low',
  low: 'Low',
  moderate: 'Moderate',
  high: 'High',
  very_high: 'Very High'
};

const CONTACT_LABELS: Record<ContactCompleteness, string> = {
  both: 'Phone & Email',
  phone_only: 'Phone Only',
  email_only: 'Email Only',
  none: 'None'
};

type CellValue = string | number;

interface ExportColumn {
  header: string;
  key: string;
  width: number;
  value: (location: ScoredCandidate) => CellValue;
}

const COLUMNS: ExportColumn[] = [
  { header: 'Business Name', key: 'name', width: 35, value: (l) => l.name },
  { header: 'Address', key: 'address', width: 45, value: (l) => l.address },
  { header: 'Phone', key: 'phone', width: 18, value: (l) => l.phone ?? '' },
  { header: 'Email', key: 'email', width: 30, value: (l) => l.email ?? '' },
  { header: 'Website', key: 'website', width: 40, value: (l) => l.website ?? '' },
  { header: 'Rating', key: 'rating', width: 8, value: (l) => l.rating ?? '' },
  { header: 'Total Reviews', key: 'reviews', width: 12, value: (l) => l.reviewCount ?? '' },
  {
    header: 'Foot Traffic Estimate',
    key: 'foot_traffic',
    width: 20,
    value: (l) => (l.footTraffic ? FOOT_TRAFFIC_LABELS[l.footTraffic] : '')
  },
  { header: 'Category', key: 'category', width: 30, value: (l) => l.detailedCategory },
  {
    header: 'Contact Completeness',
    key: 'contact',
    width: 20,
    value: (l) => CONTACT_LABELS[l.contactCompleteness]
  },
  { header: 'Priority Score', key: 'score', width: 14, value: (l) => l.priorityScore },
  { header: 'Maps URL', key: 'maps_url', width: 40, value: (l) => l.mapsUrl ?? '' },
  { header: 'Latitude', key: 'latitude', width: 12, value: (l) => l.latitude },
  { header: 'Longitude', key: 'longitude', width: 12, value: (l) => l.longitude }
];

function byScore(locations: readonly ScoredCandidate[]): ScoredCandidate[] {
  // Stable: locations of equal score keep their stored rank order.
  return [...locations].sort((a, b) => b.priorityScore - a.priorityScore);
}

function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function generateCsv(locations: readonly ScoredCandidate[]): string {
  const lines = [COLUMNS.map((c) => escapeCsvField(c.header)).join(',')];
  for (const location of byScore(locations)) {
    lines.push(COLUMNS.map((c) => escapeCsvField(String(c.value(location)))).join(','));
  }
  return lines.join('\n');
}

export async function generateExcel(search: StoredSearchWithLocations): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  const worksheet = workbook.addWorksheet('Vending Locations', {
    views: [{ state: 'frozen', ySplit: 1 }]
  });
  worksheet.columns = COLUMNS.map(({ header, key, width }) => ({ header, key, width }));
  worksheet.getRow(1).font = { bold: true };

  for (const location of byScore(search.locations)) {
    const row = worksheet.addRow(Object.fromEntries(COLUMNS.map((c) => [c.key, c.value(location)])));
    if (location.website) {
      row.getCell('website').value = { text: location.website, hyperlink: location.website };
    }
  }

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

export interface ExportResult {
  data: string | Buffer;
  mimeType: string;
  filename: string;
}

export async function exportSearch(search: StoredSearchWithLocations, format: ExportFormat): Promise<ExportResult> {
  const filename = `vending_locations_${search.zipCode}.${format}`;
  if (format === 'csv') {
    return { data: generateCsv(search.locations), mimeType: 'text/csv; charset=utf-8', filename };
  }
  return {
    data: await generateExcel(search),
    mimeType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    filename
  };
}
