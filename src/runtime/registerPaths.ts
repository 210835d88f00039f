import path from 'node:path';
import { register } from 'tsconfig-paths';

// Resolves `@/` imports at run time, from src/ under tsx and from dist/ after a build.
register({
  baseUrl: path.resolve(__dirname, '..'),
  paths: { '@/*': ['*'] },
});
