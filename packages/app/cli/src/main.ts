import { bootstrap } from './index';

process.exitCode = await bootstrap(process.argv.slice(2));
