import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'

export default defineConfig({
  plugins: [
    dts({
      insertTypesEntry: true,
      include: ['src/**/*'],
      exclude: ['tests/**/*']
    })
  ],
  build: {
    target: 'node20',
    lib: {
      entry: {
        index: 'src/index.ts',
        cli: 'src/cli.ts'
      },
      name: 'LineCalc',
      formats: ['es']
    },
    rollupOptions: {
      external: ['json5', /^node:/]
    }
  }
})
