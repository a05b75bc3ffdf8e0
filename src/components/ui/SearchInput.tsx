import React, { useCallback } from 'react';
import { Search, X } from 'lucide-react';
import { clsx } from 'clsx';
import { useTranslation } from 'react-i18next';

interface SearchInputProps
  extends Omit<React.InputHTMLAttributes<HTMLInputElement>, 'onChange' | 'onSubmit' | 'value'> {
  value: string;
  onChange: (value: string) => void;
  /** Called when Enter is pressed */
  onSubmit?: () => void;
}

export const SearchInput: React.FC<SearchInputProps> = ({
  className,
  value,
  onChange,
  onSubmit,
  placeholder,
  ...props
}) => {
  const { t } = useTranslation();

  const handleChange = useCallback(
    (e: React.ChangeEvent<HTMLInputElement>) => onChange(e.target.value),
    [onChange]
  );

  const handleKeyDown = useCallback(
    (e: React.KeyboardEvent<HTMLInputElement>) => {
      if (e.key === 'Enter' && onSubmit) {
        e.preventDefault();
        onSubmit();
      }
    },
    [onSubmit]
  );

  return (
    <div className={clsx('relative group', className)}>
      <div className="absolute inset-y-0 left-0 pl-3 flex items-center pointer-events-none">
        <Search className="h-4 w-4 text-text-dim group-focus-within:text-text-main transition-colors" />
      </div>
      <input
        type="text"
        value={value}
        onChange={handleChange}
        onKeyDown={handleKeyDown}
        className="block w-full pl-9 pr-8 py-2 h-9 border border-border-light rounded-md leading-5 bg-white text-text-main placeholder-text-dim focus:outline-none focus:ring-2 focus:ring-action-primary/20 focus:border-action-primary text-sm shadow-sm transition-all duration-200"
        placeholder={placeholder || t('form.query_placeholder')}
        {...props}
      />
      {value && (
        <button
          type="button"
          onClick={() => onChange('')}
          aria-label={t('form.clear_query')}
          className="absolute inset-y-0 right-0 pr-3 flex items-center text-text-dim hover:text-text-main transition-colors"
        >
          <X className="h-4 w-4" />
        </button>
      )}
    </div>
  );
};
