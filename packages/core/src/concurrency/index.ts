export { KeyedFifoExecutor, type KeyedFifoExecutorOptions } from './keyed-fifo-executor.js';
