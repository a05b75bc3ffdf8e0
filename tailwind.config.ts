import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        'bg-main': '#ffffff',
        'bg-sidebar': '#f7f7f5',
        'text-main': '#37352f',
        'text-muted': '#6b6b6b',
        'text-dim': '#9b9a97',
        'border-light': '#e9e9e7',
        'action-primary': '#2383e2',
      },
      fontFamily: {
        sans: ['Inter', 'ui-sans-serif', 'system-ui', 'sans-serif'],
      },
    },
  },
  plugins: [],
} satisfies Config;
