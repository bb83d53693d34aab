// Discovery of per-node history stores in a data directory

import { readdir } from "node:fs/promises"
import { StoreNotFoundError } from "../errors.ts"
import { LevelStatsStore, MemoryStatsStore, STORE_DIR_PREFIX } from "./db.ts"
import type { IStatsStore } from "./db.ts"

export interface StoreLocator {
  /** Names of the nodes that have a store, sorted */
  list(): Promise<string[]>
  open(node: string): Promise<IStatsStore>
}

export class LevelStoreLocator implements StoreLocator {
  private readonly dataDir: string

  constructor(dataDir: string) {
    this.dataDir = dataDir
  }

  async list(): Promise<string[]> {
    const entries = await readdir(this.dataDir, { withFileTypes: true })
    return entries
      .filter((e) => e.isDirectory() && e.name.startsWith(STORE_DIR_PREFIX) && e.name.length > STORE_DIR_PREFIX.length)
      .map((e) => e.name.slice(STORE_DIR_PREFIX.length))
      .sort()
  }

  async open(node: string): Promise<IStatsStore> {
    const nodes = await this.list()
    if (!nodes.includes(node)) throw new StoreNotFoundError(node)
    const store = new LevelStatsStore(this.dataDir, node)
    await store.open()
    return store
  }
}

export class MemoryStoreLocator implements StoreLocator {
  private readonly stores: Map<string, MemoryStatsStore>

  constructor(stores: Record<string, MemoryStatsStore>) {
    this.stores = new Map(Object.entries(stores))
  }

  async list(): Promise<string[]> {
    return [...this.stores.keys()].sort()
  }

  async open(node: string): Promise<IStatsStore> {
    const store = this.stores.get(node)
    if (!store) throw new StoreNotFoundError(node)
    return store
  }
}
