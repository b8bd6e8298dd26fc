import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  // Bundle the @botkeeper/* workspace packages so dist/ runs on its own.
  // Third-party runtime deps stay external and are listed in package.json.
  noExternal: [/^@botkeeper\//],
  external: ['grammy', 'dotenv'],
});
