import { createRequire } from 'node:module'
import { defineConfig } from 'vitest/config'

const require = createRequire(import.meta.url)

export default defineConfig({
    resolve: {
        alias: [
            // koishi's ESM entry cannot be loaded by Node directly; use its CommonJS build
            { find: /^koishi$/, replacement: require.resolve('koishi') }
        ]
    },
    test: {
        environment: 'node',
        include: ['packages/*/tests/**/*.spec.ts']
    }
})
