import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: {
    cli: './src/cli.ts',
    index: './src/index.ts',
  },
  format: 'esm',
  clean: true,
  dts: true,
  target: 'node20',
  platform: 'node',
  external: ['ansis', 'debug', 'execa', 'graphlib'],
});
