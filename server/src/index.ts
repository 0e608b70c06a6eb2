import { readConfig } from './env.js'
import { createApp } from './app.js'
import { createExcelRepository } from './repository.js'

const config = readConfig()
const app = createApp(createExcelRepository(config.tasksPath, config.sheet))

app.listen(config.port, () => {
  console.log(`Server listening on http://localhost:${config.port} (source: ${config.tasksPath})`)
})
