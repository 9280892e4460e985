import path from 'node:path';
import { defineConfig } from 'vitest/config';

const alias = (prefix: string, dir: string) => ({
    find: new RegExp(`^#${prefix}/(.*)$`),
    replacement: path.resolve(__dirname, dir, '$1'),
});

export default defineConfig({
    resolve: {
        alias: [
            alias('src', 'src'),
            alias('config', 'src/config'),
            alias('interfaces', 'src/interfaces'),
            alias('models', 'src/models'),
            alias('services', 'src/services'),
            alias('utils', 'src/utils'),
        ],
    },
    test: {
        include: ['test/**/*.test.ts'],
        environment: 'node',
    },
});
