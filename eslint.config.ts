import js from '@eslint/js';
import tseslint from 'typescript-eslint';

export default tseslint.config(
  js.configs.recommended,
  ...tseslint.configs.recommended,
  {
    languageOptions: {
      parserOptions: {
        project: './tsconfig.json',
        ecmaVersion: 2022,
        sourceType: 'module',
      },
    },
    rules: {
      // 複雑度関連のルール
      'max-depth': ['error', 4],
      complexity: ['warn', 15],
      'max-lines-per-function': ['warn', { max: 100, skipBlankLines: true, skipComments: true }],
      'max-params': ['warn', 5],

      // TypeScript 固有のルール
      '@typescript-eslint/explicit-function-return-type': 'off',
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-floating-promises': 'error',
    },
  },
  {
    // テストファイルは複雑度チェックを緩和
    files: ['tests/**/*.ts'],
    rules: {
      'max-lines-per-function': ['warn', { max: 400, skipBlankLines: true, skipComments: true }],
      'max-depth': ['warn', 6],
      complexity: ['warn', 25],
    },
  },
  {
    ignores: ['dist/**', 'node_modules/**', '*.js', '*.config.ts'],
  }
);
