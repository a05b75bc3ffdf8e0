import { fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import i18n from '../i18n';
import { SearchInput } from '../components/ui/SearchInput';

describe('SearchInput', () => {
  afterEach(async () => {
    await i18n.changeLanguage('en');
  });

  it('clears the value from its labelled button', () => {
    const onChange = vi.fn();
    render(<SearchInput value="topic:cli" onChange={onChange} />);

    fireEvent.click(screen.getByRole('button', { name: 'Clear query' }));
    expect(onChange).toHaveBeenCalledWith('');
  });

  it('translates the clear button label', async () => {
    await i18n.changeLanguage('zh');
    render(<SearchInput value="topic:cli" onChange={vi.fn()} />);

    expect(screen.getByRole('button', { name: '清除搜索条件' })).toBeInTheDocument();
  });
});
