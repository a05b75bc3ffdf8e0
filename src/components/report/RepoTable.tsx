import React, { useMemo, useState } from 'react';
import { useTranslation } from 'react-i18next';
import { ChevronDown, ChevronUp } from 'lucide-react';
import { formatCount, formatTimestamp } from '../../lib/format';
import type { RepoRow } from '../../types';

// ============================================================================
// Types
// ============================================================================

type SortField = 'name' | 'stars' | 'forks' | 'watchers' | 'language' | 'createdAt';
type SortDirection = 'asc' | 'desc';

/** `null` keeps the order the API returned */
type SortConfig = { field: SortField; direction: SortDirection } | null;

interface Column {
  field: SortField;
  labelKey: string;
  align: 'left' | 'right';
}

// ============================================================================
// Constants
// ============================================================================

const COLUMNS: Column[] = [
  { field: 'name', labelKey: 'table.name', align: 'left' },
  { field: 'stars', labelKey: 'table.stars', align: 'right' },
  { field: 'forks', labelKey: 'table.forks', align: 'right' },
  { field: 'watchers', labelKey: 'table.watchers', align: 'right' },
  { field: 'language', labelKey: 'table.language', align: 'left' },
  { field: 'createdAt', labelKey: 'table.created_at', align: 'left' },
];

const compareRows = (a: RepoRow, b: RepoRow, field: SortField): number => {
  switch (field) {
    case 'name':
    case 'language':
      return a[field].localeCompare(b[field]);
    case 'createdAt':
      return a.createdAt.getTime() - b.createdAt.getTime();
    default:
      return a[field] - b[field];
  }
};

// Cycles desc -> asc -> API order
const nextSort = (current: SortConfig, field: SortField): SortConfig => {
  if (!current || current.field !== field) return { field, direction: 'desc' };
  if (current.direction === 'desc') return { field, direction: 'asc' };
  return null;
};

// ============================================================================
// Sub Components
// ============================================================================

interface SortableHeaderProps {
  column: Column;
  label: string;
  currentSort: SortConfig;
  onSort: (field: SortField) => void;
}

const SortableHeader: React.FC<SortableHeaderProps> = ({ column, label, currentSort, onSort }) => {
  const activeDirection = currentSort?.field === column.field ? currentSort.direction : null;
  const ariaSort =
    activeDirection === 'asc' ? 'ascending' : activeDirection === 'desc' ? 'descending' : 'none';

  return (
    <th
      aria-sort={ariaSort}
      className="px-4 py-3 whitespace-nowrap cursor-pointer hover:bg-gray-100 transition-colors select-none"
      onClick={() => onSort(column.field)}
    >
      <div className={`flex items-center gap-1 ${column.align === 'right' ? 'justify-end' : 'justify-start'}`}>
        <span>{label}</span>
        <span className="flex flex-col">
          <ChevronUp
            className={`w-3 h-3 -mb-1 ${
              activeDirection === 'asc' ? 'text-action-primary' : 'text-gray-300'
            }`}
          />
          <ChevronDown
            className={`w-3 h-3 ${
              activeDirection === 'desc' ? 'text-action-primary' : 'text-gray-300'
            }`}
          />
        </span>
      </div>
    </th>
  );
};

// ============================================================================
// Main Component
// ============================================================================

export const RepoTable: React.FC<{ rows: readonly RepoRow[] }> = ({ rows }) => {
  const { t } = useTranslation();
  const [sortConfig, setSortConfig] = useState<SortConfig>(null);

  const sortedRows = useMemo(() => {
    if (!sortConfig) return rows;
    const factor = sortConfig.direction === 'asc' ? 1 : -1;
    return [...rows].sort((a, b) => factor * compareRows(a, b, sortConfig.field));
  }, [rows, sortConfig]);

  return (
    <div className="bg-white rounded-lg border border-border-light shadow-sm overflow-x-auto">
      <table className="w-full text-sm">
        <thead className="bg-bg-sidebar text-xs text-text-muted">
          <tr>
            {COLUMNS.map((column) => (
              <SortableHeader
                key={column.field}
                column={column}
                label={t(column.labelKey)}
                currentSort={sortConfig}
                onSort={(field) => setSortConfig((prev) => nextSort(prev, field))}
              />
            ))}
          </tr>
        </thead>
        <tbody className="divide-y divide-border-light">
          {sortedRows.map((row) => (
            <tr key={row.name} className="hover:bg-gray-50">
              <td className="px-4 py-2.5 font-medium text-text-main">
                <a
                  href={`https://github.com/${row.name}`}
                  target="_blank"
                  rel="noopener noreferrer"
                  className="hover:underline"
                >
                  {row.name}
                </a>
              </td>
              <td className="px-4 py-2.5 text-right tabular-nums">{formatCount(row.stars)}</td>
              <td className="px-4 py-2.5 text-right tabular-nums">{formatCount(row.forks)}</td>
              <td className="px-4 py-2.5 text-right tabular-nums">{formatCount(row.watchers)}</td>
              <td className="px-4 py-2.5 text-text-muted">{row.language}</td>
              <td className="px-4 py-2.5 text-text-muted tabular-nums whitespace-nowrap">
                {formatTimestamp(row.createdAt)}
              </td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};
