import { Globe } from 'lucide-react';
import { useTranslation } from 'react-i18next';
import { SUPPORTED_LANGUAGES } from '../../i18n';

const LANGUAGE_BADGES: Record<(typeof SUPPORTED_LANGUAGES)[number], string> = {
  en: 'EN',
  zh: '中',
};

export const LanguageSwitch = () => {
  const { t, i18n } = useTranslation();
  const current = i18n.language === 'zh' ? 'zh' : 'en';

  const toggleLanguage = () => {
    const index = SUPPORTED_LANGUAGES.indexOf(current);
    const next = SUPPORTED_LANGUAGES[(index + 1) % SUPPORTED_LANGUAGES.length];
    i18n.changeLanguage(next).catch((error: unknown) => {
      console.warn('[i18n] failed to switch language:', error);
    });
  };

  return (
    <button
      type="button"
      onClick={toggleLanguage}
      className="h-8 px-3 rounded-lg text-xs font-semibold border border-border-light bg-white/90 hover:bg-white text-text-main min-w-[72px] shadow-sm inline-flex items-center justify-center gap-1.5"
      title={t('settings.language')}
    >
      <Globe className="w-3.5 h-3.5 text-text-dim" />
      <span>{LANGUAGE_BADGES[current]}</span>
    </button>
  );
};
