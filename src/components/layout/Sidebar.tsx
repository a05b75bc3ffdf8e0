import { useEffect, useState } from 'react';
import { BarChart3, Loader2, Menu, X } from 'lucide-react';
import clsx from 'clsx';
import { useTranslation } from 'react-i18next';
import { SearchInput } from '../ui/SearchInput';
import { LanguageSwitch } from './LanguageSwitch';
import { LIMIT_MAX, LIMIT_MIN } from '../../lib/searchForm';
import { SORT_KEYS, SORT_ORDERS } from '../../types';
import type { SearchParams, SortKey, SortOrder } from '../../types';

const SIDEBAR_MIN_WIDTH = 240;
const SIDEBAR_MAX_WIDTH = 420;
const SIDEBAR_DEFAULT_WIDTH = 280;
const SIDEBAR_WIDTH_KEY = 'repo-pulse.sidebar.width';

const clampSidebarWidth = (width: number) =>
  Math.min(SIDEBAR_MAX_WIDTH, Math.max(SIDEBAR_MIN_WIDTH, width));

interface SidebarProps {
  params: SearchParams;
  onParamsChange: (params: SearchParams) => void;
  onAnalyze: () => void;
  isRunning: boolean;
}

const fieldLabelClass = 'block text-xs font-medium text-text-muted mb-1.5';
const selectClass =
  'block w-full h-9 px-2 border border-border-light rounded-md bg-white text-sm text-text-main shadow-sm focus:outline-none focus:ring-2 focus:ring-action-primary/20 focus:border-action-primary';

export const Sidebar = ({ params, onParamsChange, onAnalyze, isRunning }: SidebarProps) => {
  const { t } = useTranslation();
  const [sidebarWidth, setSidebarWidth] = useState(() => {
    if (typeof window === 'undefined') {
      return SIDEBAR_DEFAULT_WIDTH;
    }

    const storedWidth = Number(window.localStorage.getItem(SIDEBAR_WIDTH_KEY));
    return Number.isFinite(storedWidth) && storedWidth > 0
      ? clampSidebarWidth(storedWidth)
      : SIDEBAR_DEFAULT_WIDTH;
  });
  const [isResizing, setIsResizing] = useState(false);
  const [isMobile, setIsMobile] = useState(
    typeof window !== 'undefined' ? window.innerWidth < 1024 : false
  );
  const [mobileOpen, setMobileOpen] = useState(false);

  const update = <K extends keyof SearchParams>(key: K, value: SearchParams[K]) =>
    onParamsChange({ ...params, [key]: value });

  const submit = () => {
    if (isRunning) return;
    if (isMobile) setMobileOpen(false);
    onAnalyze();
  };

  useEffect(() => {
    const effectiveWidth = isMobile ? 0 : sidebarWidth;
    document.documentElement.style.setProperty('--sidebar-width', `${effectiveWidth}px`);
    window.localStorage.setItem(SIDEBAR_WIDTH_KEY, String(sidebarWidth));
  }, [sidebarWidth, isMobile]);

  useEffect(() => {
    const handleResize = () => {
      const nextIsMobile = window.innerWidth < 1024;
      setIsMobile(nextIsMobile);
      if (!nextIsMobile) {
        setMobileOpen(false);
      }
    };

    window.addEventListener('resize', handleResize);
    return () => window.removeEventListener('resize', handleResize);
  }, []);

  useEffect(() => {
    if (!isResizing || isMobile) return;

    const handlePointerMove = (event: PointerEvent) => {
      setSidebarWidth(clampSidebarWidth(event.clientX));
    };

    const handlePointerUp = () => {
      setIsResizing(false);
    };

    window.addEventListener('pointermove', handlePointerMove);
    window.addEventListener('pointerup', handlePointerUp);
    document.body.style.cursor = 'col-resize';
    document.body.style.userSelect = 'none';

    return () => {
      window.removeEventListener('pointermove', handlePointerMove);
      window.removeEventListener('pointerup', handlePointerUp);
      document.body.style.cursor = '';
      document.body.style.userSelect = '';
    };
  }, [isResizing, isMobile]);

  return (
    <>
      {isMobile && (
        <button
          type="button"
          onClick={() => setMobileOpen((prev) => !prev)}
          className="fixed left-3 top-3 z-[70] inline-flex h-9 w-9 items-center justify-center rounded-md border border-border-light bg-white/95 text-text-main shadow-sm backdrop-blur-sm"
          aria-label={mobileOpen ? t('form.close_panel') : t('form.open_panel')}
        >
          {mobileOpen ? <X className="h-4 w-4" /> : <Menu className="h-4 w-4" />}
        </button>
      )}

      {isMobile && mobileOpen && (
        <button
          type="button"
          className="fixed inset-0 z-[55] bg-black/40"
          onClick={() => setMobileOpen(false)}
          aria-label={t('form.close_panel')}
        />
      )}

      <aside
        className={clsx(
          'fixed left-0 top-0 bottom-0 bg-bg-sidebar/95 backdrop-blur-sm border-r border-border-light flex flex-col z-[60] transition-transform duration-200',
          isMobile ? (mobileOpen ? 'translate-x-0' : '-translate-x-full') : 'translate-x-0'
        )}
        style={{ width: `${isMobile ? Math.min(sidebarWidth, 300) : sidebarWidth}px` }}
      >
        {/* Brand */}
        <div className="flex items-center justify-between gap-2 px-4 h-12 mt-2 mx-2 mb-2 select-none">
          <div className="flex items-center gap-2 min-w-0">
            <BarChart3 className="w-4 h-4 text-text-main" />
            <span className="text-sm font-semibold text-text-main truncate">{t('app.title')}</span>
          </div>
          <LanguageSwitch />
        </div>

        {/* Search form */}
        <form
          className="flex-1 px-4 space-y-5 overflow-y-auto"
          onSubmit={(event) => {
            event.preventDefault();
            submit();
          }}
        >
          <h3 className="text-xs font-semibold uppercase tracking-wide text-text-dim">
            {t('form.heading')}
          </h3>

          <div>
            <label htmlFor="query" className={fieldLabelClass}>
              {t('form.query_label')}
            </label>
            <SearchInput
              id="query"
              value={params.query}
              onChange={(value) => update('query', value)}
              onSubmit={submit}
            />
          </div>

          <div>
            <label htmlFor="limit" className={fieldLabelClass}>
              {t('form.limit_label')}: <span className="text-text-main">{params.limit}</span>
            </label>
            <input
              id="limit"
              type="range"
              min={LIMIT_MIN}
              max={LIMIT_MAX}
              step={1}
              value={params.limit}
              onChange={(event) => update('limit', Number(event.target.value))}
              className="w-full accent-action-primary"
            />
            <div className="flex justify-between text-[11px] text-text-dim">
              <span>{LIMIT_MIN}</span>
              <span>{LIMIT_MAX}</span>
            </div>
          </div>

          <div>
            <label htmlFor="sort" className={fieldLabelClass}>
              {t('form.sort_label')}
            </label>
            <select
              id="sort"
              value={params.sort}
              onChange={(event) => {
                const next = SORT_KEYS.find((key) => key === event.target.value);
                if (next) update('sort', next satisfies SortKey);
              }}
              className={selectClass}
            >
              {SORT_KEYS.map((key) => (
                <option key={key} value={key}>
                  {t(`form.sort.${key}`)}
                </option>
              ))}
            </select>
          </div>

          <div>
            <label htmlFor="order" className={fieldLabelClass}>
              {t('form.order_label')}
            </label>
            <select
              id="order"
              value={params.order}
              onChange={(event) => {
                const next = SORT_ORDERS.find((order) => order === event.target.value);
                if (next) update('order', next satisfies SortOrder);
              }}
              className={selectClass}
            >
              {SORT_ORDERS.map((order) => (
                <option key={order} value={order}>
                  {t(`form.order.${order}`)}
                </option>
              ))}
            </select>
          </div>

          <button
            type="submit"
            disabled={isRunning}
            className={clsx(
              'w-full h-9 px-4 rounded-md text-sm font-medium transition-all flex items-center justify-center gap-2 focus:outline-none focus:ring-2 focus:ring-offset-2 focus:ring-black/20',
              isRunning
                ? 'bg-gray-100 text-gray-400 cursor-not-allowed'
                : 'bg-black text-white hover:bg-gray-800 shadow-sm active:scale-95'
            )}
          >
            {isRunning && <Loader2 className="animate-spin h-4 w-4" />}
            {isRunning ? t('form.analyzing') : t('form.analyze')}
          </button>
        </form>

        {!isMobile && (
          <div
            role="separator"
            aria-orientation="vertical"
            aria-label={t('form.resize_panel')}
            onPointerDown={(event) => {
              event.preventDefault();
              setIsResizing(true);
            }}
            className="absolute top-0 right-0 h-full w-1.5 cursor-col-resize group"
          >
            <div
              className={clsx(
                'absolute top-0 right-0 h-full w-px transition-colors',
                isResizing ? 'bg-action-primary/60' : 'bg-transparent group-hover:bg-border-light'
              )}
            />
          </div>
        )}
      </aside>
    </>
  );
};
