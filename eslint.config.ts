import eslint from '@eslint/js';
import { defineConfig } from 'eslint/config';
import prettierPlugin from 'eslint-plugin-prettier';
import tseslint from 'typescript-eslint';

const tsFiles = ['**/*.ts'];
const srcTsFiles = ['src/**/*.ts'];
const configTsFiles = ['**/eslint.config.ts', '**/*.config.ts'];

const withFiles = <T extends object>(configs: T[], files: string[]) =>
  configs.map((config) => ({
    ...config,
    files,
  }));

export default defineConfig([
  {
    ignores: ['**/node_modules/**/*', '**/dist/**/*', '**/coverage/**/*', '**/*.d.ts'],
  },
  eslint.configs.recommended,
  ...withFiles(tseslint.configs.recommended, tsFiles),
  ...withFiles(tseslint.configs.recommendedTypeChecked, srcTsFiles),
  ...withFiles(tseslint.configs.stylisticTypeChecked, srcTsFiles),
  {
    files: tsFiles,
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: {
        ecmaVersion: 'latest',
        sourceType: 'module',
      },
    },
    plugins: {
      prettier: prettierPlugin,
    },
    rules: {
      '@typescript-eslint/consistent-type-imports': ['error', { prefer: 'type-imports' }],
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-unused-vars': ['error', { argsIgnorePattern: '^_' }],
      '@typescript-eslint/no-empty-function': 'error',
      '@typescript-eslint/no-non-null-assertion': 'error',
      '@typescript-eslint/ban-ts-comment': 'error',

      'prefer-const': 'error',
      'no-var': 'error',
      eqeqeq: ['error', 'always'],
      'no-console': ['warn', { allow: ['warn', 'error'] }],
      'no-duplicate-imports': 'error',
      'object-shorthand': ['error', 'always'],

      'prettier/prettier': [
        'error',
        {
          singleQuote: true,
          semi: true,
          trailingComma: 'all',
          printWidth: 100,
        },
      ],
    },
  },
  {
    files: srcTsFiles,
    ignores: configTsFiles,
    languageOptions: {
      parserOptions: {
        project: ['./tsconfig.json'],
      },
    },
  },
  {
    files: configTsFiles,
    ...tseslint.configs.disableTypeChecked,
  },
]);
