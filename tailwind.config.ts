import type { Config } from 'tailwindcss';

const config: Config = {
  content: ['./src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        brand: '#1C56F6',
        paper: '#f4f1ef',
        ink: '#131312',
      },
    },
  },
  plugins: [],
};

export default config;
