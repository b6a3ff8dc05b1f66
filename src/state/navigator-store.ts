import type { StateCreator } from "zustand"
import { subscribeWithSelector } from "zustand/middleware"
import { immer } from "zustand/middleware/immer"
import { createStore } from "zustand/vanilla"

import { buildQueryOptions, queryHistory } from "@/lib/history-query"
import * as transitions from "@/state/navigator"
import { parseSettings } from "@/state/settings"
import {
  type Collection,
  type HistoryStore,
  type InboundMessage,
  type NavigatorSettingsInput,
  type NavigatorState,
  type NavigatorStateApi,
  type NavigatorStateSlice,
  type OutboundMessage,
  toAppError,
} from "@/types"

export interface NavigatorStoreOptions {
  collections?: Collection[]
  historyStore?: HistoryStore | null
  settings?: NavigatorSettingsInput
}

export const createNavigatorSlice = (
  options: NavigatorStoreOptions = {},
): StateCreator<
  NavigatorStateSlice,
  [["zustand/immer", never], ["zustand/subscribeWithSelector", never]],
  [],
  NavigatorStateSlice
> => {
  const settings = parseSettings(options.settings ?? {})

  return (set, get, _storeApi) => {
    let historyStore = options.historyStore ?? null
    // dispatches run one after the other, each to completion
    let queue: Promise<unknown> = Promise.resolve()

    const state = () => get().navigatorState
    const commit = (next: NavigatorState) => {
      set((app) => {
        app.navigatorState = next
      })
    }

    const runHistoryQuery = async () => {
      const store = historyStore
      if (!store) {
        console.debug("[Navigator] history requested but no store is attached")
        commit(transitions.setHistoryAvailable(state(), false))
        return
      }
      const query = buildQueryOptions(settings.history, state().history)
      const result = await queryHistory(store, query, { timeoutMs: settings.history.timeoutMs })
      if (historyStore !== store) {
        console.debug("[Navigator] history store replaced during the query, dropping its result")
        return
      }
      commit(transitions.receiveHistory(state(), result))
    }

    const handle = async (message: InboundMessage): Promise<OutboundMessage | null> => {
      const [next, effect] = transitions.update(state(), message, settings)
      commit(next)
      if (!effect) {
        return null
      }
      switch (effect.type) {
        case "emit":
          return effect.message
        case "query-history":
          await runHistoryQuery()
          return null
      }
    }

    const enqueue = <T>(task: () => Promise<T>): Promise<T> => {
      const run = queue.then(task)
      // the caller sees the failure through `run`; the queue itself keeps going
      queue = run.then(
        () => undefined,
        () => undefined,
      )
      return run
    }

    const navigatorApi: NavigatorStateApi = {
      dispatch(message: InboundMessage) {
        return enqueue(() => handle(message))
      },

      setCollections(collections: Collection[]) {
        commit(transitions.setCollections(state(), collections))
      },

      addRequest(request, collectionId) {
        const [next, added] = transitions.addRequest(state(), request, collectionId)
        commit(next)
        return added
      },

      deleteRequest(requestId: string) {
        const [next, owner] = transitions.deleteRequest(state(), requestId)
        commit(next)
        return owner
      },

      getOrCreateCollection(name: string) {
        const [next, collection] = transitions.getOrCreateCollection(state(), name)
        commit(next)
        return collection
      },

      expandAt(index: number) {
        commit(transitions.expandAt(state(), index))
      },

      collapseAt(index: number) {
        commit(transitions.collapseAt(state(), index))
      },

      setCursor(index: number) {
        commit(transitions.setCursor(state(), index))
      },

      getSelectedItem() {
        return transitions.selectItem(state())
      },

      getSelectedCollection() {
        return transitions.selectCollection(state())
      },

      visibleItemCount() {
        return transitions.selectDisplayItems(state()).length
      },

      setHistoryStore(store: HistoryStore | null) {
        historyStore = store
        commit(transitions.setHistoryAvailable(state(), store !== null))
        return store ? enqueue(runHistoryQuery) : Promise.resolve()
      },

      refreshHistory() {
        return enqueue(runHistoryQuery)
      },
    }

    if (historyStore) {
      // runs once the store exists, ahead of any dispatch
      queue = queue.then(runHistoryQuery).catch((e: unknown) => {
        console.debug(`[Navigator] initial history load failed: ${toAppError(e).message}`)
      })
    }

    return {
      navigatorState: {
        ...transitions.createNavigatorState(options.collections ?? []),
        history: {
          ...transitions.createNavigatorState().history,
          available: historyStore !== null,
        },
      },
      navigatorApi,
    }
  }
}

/**
 * One navigator instance. Nothing is shared between stores.
 */
export const createNavigatorStore = (options: NavigatorStoreOptions = {}) =>
  createStore<NavigatorStateSlice>()(immer(subscribeWithSelector(createNavigatorSlice(options))))

export type NavigatorStore = ReturnType<typeof createNavigatorStore>
