import { loadCollectionFile } from '../loader';
import type { Plugin } from '../plugin-api';

export const coreLoaderPlugin = (baseDir: string = process.cwd()): Plugin => ({
  name: 'core-loader',
  setup(ctx) {
    ctx.onLoad({ filter: /\.(json|ya?ml)$/ }, async ({ path }) => loadCollectionFile(path, baseDir));
  },
});
