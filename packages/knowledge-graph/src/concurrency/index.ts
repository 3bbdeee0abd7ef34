export { ReadWriteLock } from "./read-write-lock"
