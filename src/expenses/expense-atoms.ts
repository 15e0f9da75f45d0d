import { atom } from 'jotai'
import { sortNewestFirst, type ExpenseRecord } from './expense-types.js'
import type { RejectedRow } from './expense-store.js'
import { analyzeSpending, applyFilters, byCategory, type DateRange, type ExpenseFilters } from '../reporting/index.js'

// Core data atoms
export const expensesAtom = atom<ExpenseRecord[]>([])
export const rejectedRowsAtom = atom<RejectedRow[]>([])

// Loading states
export const isLoadingAtom = atom(false)
export const errorAtom = atom<string | null>(null)

// Filter state (date ranges are validated before they are stored)
export const searchQueryAtom = atom('')
export const categoryFilterAtom = atom<string | null>(null)
export const dateRangeAtom = atom<DateRange | null>(null)

// Derived: active filters in analyzer form
export const filtersAtom = atom((get): ExpenseFilters => {
  const filters: ExpenseFilters = {}
  const category = get(categoryFilterAtom)
  const range = get(dateRangeAtom)
  const keyword = get(searchQueryAtom)

  if (category !== null) filters.category = category
  if (range) filters.range = range
  if (keyword) filters.keyword = keyword
  return filters
})

// Derived: filtered expenses, newest first
export const filteredExpensesAtom = atom((get) =>
  sortNewestFirst(applyFilters(get(expensesAtom), get(filtersAtom)))
)

// Derived: categories in order of first appearance, for filter cycling
export const categoriesAtom = atom((get) => [...byCategory(get(expensesAtom)).keys()])

// Derived: summary of whatever the list currently shows
export const createSummaryAtom = (topLimit: number) =>
  atom((get) =>
    analyzeSpending({
      records: applyFilters(get(expensesAtom), get(filtersAtom)),
      filters: get(filtersAtom),
      topLimit,
    })
  )

// Action: move the category filter to the next category (then back to all)
export const cycleCategoryAtom = atom(null, (get, set) => {
  const categories = get(categoriesAtom)
  const current = get(categoryFilterAtom)
  const index = current === null ? -1 : categories.indexOf(current)
  const next = categories[index + 1] ?? null
  set(categoryFilterAtom, next)
})

export const clearFiltersAtom = atom(null, (_get, set) => {
  set(searchQueryAtom, '')
  set(categoryFilterAtom, null)
  set(dateRangeAtom, null)
})
