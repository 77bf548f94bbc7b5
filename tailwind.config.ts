import type { Config } from 'tailwindcss';

const config: Config = {
  content: [
    './src/components/**/*.{ts,tsx}',
    './src/app/**/*.{ts,tsx}',
  ],
  theme: {
    extend: {
      colors: {
        // Background layers (darkest to lightest)
        'bg-base': '#0b0e13',
        'bg-primary': '#11151c',
        'bg-elevated': '#181d26',
        'bg-hover': '#202734',
        'bg-active': '#283142',
        // Text
        'text-primary': '#eef2f8',
        'text-secondary': '#aab4c3',
        'text-muted': '#6b7689',
        // Accents; blue marks anime, green marks manga
        'accent-blue': '#4c8dff',
        'accent-green': '#3fcf8e',
        border: '#2a3240',
        'focus-ring': '#4c8dff',
      },
      fontFamily: {
        sans: [
          'Inter',
          '-apple-system',
          'BlinkMacSystemFont',
          'Segoe UI',
          'Roboto',
          'Helvetica Neue',
          'Arial',
          'sans-serif',
        ],
      },
      boxShadow: {
        card: '0 8px 18px rgba(0, 0, 0, 0.45)',
        dropdown: '0 4px 12px rgba(0, 0, 0, 0.3)',
      },
      animation: {
        'fade-in': 'fadeIn 200ms ease-out',
        progress: 'progress 1.2s ease-in-out infinite',
      },
      keyframes: {
        fadeIn: {
          '0%': { opacity: '0' },
          '100%': { opacity: '1' },
        },
        progress: {
          '0%': { left: '-33%' },
          '100%': { left: '100%' },
        },
      },
    },
  },
  plugins: [],
};

export default config;
