import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const packageEntry = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@tinyjvm/types': packageEntry('types'),
      '@tinyjvm/core': packageEntry('core'),
      '@tinyjvm/classfile': packageEntry('classfile'),
      '@tinyjvm/jvm': packageEntry('jvm'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      PINO_LEVEL: 'silent',
    },
  },
})
