import { defineConfig } from 'tsup';

export default defineConfig((options) => {
  const isWatch = Boolean(options.watch);
  const isDebugBuild = process.env.WORKON_DEBUG_BUILD === '1';
  const shouldKeepDebugInfo = isWatch || isDebugBuild;

  return {
    entry: {
      index: 'src/index.ts',
    },
    format: ['cjs'],
    dts: false,
    clean: true,
    splitting: false,
    sourcemap: shouldKeepDebugInfo,
    banner: { js: '#!/usr/bin/env node' },
    bundle: true,
    minify: !shouldKeepDebugInfo,
    treeshake: !shouldKeepDebugInfo,
    platform: 'node',
    target: 'node20',
    // Keep the engine external in debug builds so breakpoints map to its sources.
    external: isDebugBuild ? ['workon-engine'] : [],
    noExternal: isDebugBuild ? [] : ['workon-engine'],
    outExtension: () => ({ js: '.cjs' }),
  };
});
