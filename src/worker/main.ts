import { parentPort } from 'node:worker_threads'
import { attach } from './index'

// Thread entry, exported as "pdf-filer/worker". The embedding app spawns it with
// `new Worker(new URL('./main.ts', import.meta.url))` under a TypeScript loader.
if (!parentPort) throw new Error('worker/main must run inside a worker thread')
attach(parentPort)
