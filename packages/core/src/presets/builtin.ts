import type { PresetDefinition } from "@stylepack/types";

const base: PresetDefinition = {
  name: "base",
  description: "ESLint + Prettier for a JavaScript or TypeScript web project",
  eslint: {
    entries: [
      {
        kind: "shared",
        specifier: "@eslint/js",
        binding: "js",
        member: "configs.recommended",
        packages: ["@eslint/js", "eslint"],
      },
      {
        kind: "shared",
        specifier: "typescript-eslint",
        binding: "tseslint",
        member: "configs.recommended",
        spread: true,
        plugins: ["@typescript-eslint"],
        packages: ["typescript-eslint"],
        typescriptOnly: true,
      },
      {
        kind: "rules",
        name: "language",
        languageOptions: { ecmaVersion: "latest", sourceType: "module" },
        rules: {},
      },
    ],
    // After the project rule set, which sets the core no-unused-vars.
    tail: [
      {
        kind: "rules",
        name: "typescript",
        files: ["**/*.{ts,tsx,mts,cts}"],
        rules: {
          "no-unused-vars": "off",
          "@typescript-eslint/no-unused-vars": [
            "warn",
            { argsIgnorePattern: "^_" },
          ],
        },
        typescriptOnly: true,
      },
      {
        kind: "shared",
        specifier: "eslint-config-prettier",
        binding: "prettierConfig",
        packages: ["eslint-config-prettier", "prettier"],
      },
    ],
    rules: {
      "no-unused-vars": ["warn", { argsIgnorePattern: "^_" }],
      "prefer-const": "error",
      eqeqeq: ["error", "always"],
      "no-console": ["warn", { allow: ["warn", "error"] }],
    },
    ignores: ["dist/**", "build/**", "coverage/**", "node_modules/**"],
  },
  prettier: {
    options: {
      semi: true,
      singleQuote: false,
      trailingComma: "all",
      printWidth: 100,
      tabWidth: 2,
    },
    overrides: [
      { files: "*.md", options: { proseWrap: "always" } },
      { files: "*.json", options: { trailingComma: "none" } },
    ],
  },
  aliases: {
    "@/*": "./src/*",
  },
  editor: {
    settings: {
      "editor.formatOnSave": true,
      "editor.defaultFormatter": "esbenp.prettier-vscode",
      "editor.codeActionsOnSave": { "source.fixAll.eslint": "explicit" },
      "eslint.useFlatConfig": true,
      "eslint.validate": [
        "javascript",
        "javascriptreact",
        "typescript",
        "typescriptreact",
      ],
    },
    recommend: ["dbaeumer.vscode-eslint", "esbenp.prettier-vscode"],
    unwanted: ["hookyqr.beautify"],
  },
  scripts: {
    lint: "eslint .",
    "lint:fix": "eslint . --fix",
    format: "prettier --write .",
    "format:check": "prettier --check .",
  },
  devDependencies: ["eslint", "prettier"],
};

const react: PresetDefinition = {
  name: "react",
  description: "React components with eslint-plugin-react",
  extends: "base",
  eslint: {
    entries: [
      {
        kind: "shared",
        specifier: "eslint-plugin-react",
        binding: "react",
        member: "configs.flat.recommended",
        plugins: ["react"],
        packages: ["eslint-plugin-react"],
      },
      {
        kind: "rules",
        name: "react",
        files: ["**/*.{jsx,tsx}"],
        settings: { react: { version: "detect" } },
        rules: {
          "react/react-in-jsx-scope": "off",
          "react/prop-types": "off",
        },
      },
    ],
  },
};

const vue: PresetDefinition = {
  name: "vue",
  description: "Vue single-file components with eslint-plugin-vue",
  extends: "base",
  eslint: {
    entries: [
      {
        kind: "shared",
        specifier: "eslint-plugin-vue",
        binding: "pluginVue",
        member: "configs['flat/recommended']",
        spread: true,
        plugins: ["vue"],
        packages: ["eslint-plugin-vue"],
      },
      {
        kind: "rules",
        name: "vue",
        files: ["**/*.vue"],
        rules: {
          "vue/multi-word-component-names": "off",
        },
      },
    ],
  },
  editor: {
    settings: {
      "eslint.validate": ["vue"],
      "[vue]": { "editor.defaultFormatter": "esbenp.prettier-vscode" },
    },
    recommend: ["Vue.volar"],
    unwanted: ["octref.vetur"],
  },
};

const svelte: PresetDefinition = {
  name: "svelte",
  description: "Svelte components with eslint-plugin-svelte and prettier-plugin-svelte",
  extends: "base",
  eslint: {
    entries: [
      {
        kind: "shared",
        specifier: "eslint-plugin-svelte",
        binding: "svelte",
        member: "configs['flat/recommended']",
        spread: true,
        plugins: ["svelte"],
        packages: ["eslint-plugin-svelte"],
      },
    ],
    tail: [
      {
        kind: "shared",
        specifier: "eslint-plugin-svelte",
        binding: "svelte",
        member: "configs['flat/prettier']",
        spread: true,
        plugins: ["svelte"],
        packages: ["eslint-plugin-svelte"],
      },
    ],
    ignores: [".svelte-kit/**"],
  },
  prettier: {
    options: {
      plugins: ["prettier-plugin-svelte"],
    },
    overrides: [{ files: "*.svelte", options: { parser: "svelte" } }],
  },
  editor: {
    settings: {
      "eslint.validate": ["svelte"],
      "[svelte]": { "editor.defaultFormatter": "svelte.svelte-vscode" },
    },
    recommend: ["svelte.svelte-vscode"],
  },
  devDependencies: ["prettier-plugin-svelte"],
};

/** Presets shipped with stylepack, keyed by name. */
export const BUILTIN_PRESETS: ReadonlyMap<string, PresetDefinition> = new Map([
  ["base", base],
  ["react", react],
  ["vue", vue],
  ["svelte", svelte],
]);
