import 'dotenv/config';
import { createApp } from './app';

const { app, config, registry } = createApp();

app.listen(config.port, () => {
  const url = `http://localhost:${config.port}`;
  const plugins = registry
    .list()
    .map((plugin) => plugin.name)
    .join(', ');
  console.log(`Inbox API running at ${url} (plugins: ${plugins})`);
});
