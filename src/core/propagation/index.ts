export { Result, Ok, Err, ok, err, isOk, isErr, map, andThen } from './Result';
export {
    tryCatch,
    tryCatchAsync,
    passThrough,
    wrapErr,
    recover,
    ignore,
    expectValue,
    unwrap,
    rethrowWithContext,
} from './policies';
export { JoinHandle, spawn, joinAll } from './JoinHandle';
