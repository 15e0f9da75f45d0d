import { atom } from 'jotai'

export type Screen = 'expenses' | 'add' | 'summary' | 'help'

export const currentScreenAtom = atom<Screen>('expenses')

// Navigation actions
export const navigateAtom = atom(null, (_get, set, screen: Screen) => {
  set(currentScreenAtom, screen)
})

export const goBackAtom = atom(null, (_get, set) => {
  set(currentScreenAtom, 'expenses')
})
