import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Listed one by one: a 'packages/*' glob would also pick up any stray
    // config file sitting in packages/.
    projects: [
      'packages/errors',
      'packages/http',
      'packages/store',
      'packages/testing',
      'apps/shop',
    ],
  },
})
