const isDebug = () => process.env.DEBUG === 'true';

export const logger = {
  info: (message: string) => {
    console.log(`ℹ ${message}`);
  },

  success: (message: string) => {
    console.log(`✓ ${message}`);
  },

  warn: (message: string) => {
    console.warn(`⚠ ${message}`);
  },

  error: (message: string) => {
    console.error(`✗ ${message}`);
  },

  debug: (message: string) => {
    if (isDebug()) {
      console.log(`[DEBUG] ${message}`);
    }
  },

  // [1. フィード取得] のようなステップ見出し
  step: (index: number, label: string) => {
    console.log(`\n[${index}. ${label}]`);
  }
};
