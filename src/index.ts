import { run } from './action';

run();
