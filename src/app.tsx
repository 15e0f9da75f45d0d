import React, { useEffect, useCallback } from 'react'
import { Box, Text } from 'ink'
import { useAtomValue, useSetAtom } from 'jotai'
import { Provider } from 'jotai/react'
import { basename } from 'node:path'

import { currentScreenAtom, goBackAtom } from './navigation/navigation-atoms.js'
import { expensesAtom, rejectedRowsAtom, isLoadingAtom, errorAtom } from './expenses/expense-atoms.js'
import { loadExpenses } from './expenses/expense-store.js'
import { ExpenseList } from './expenses/ExpenseList.js'
import { AddExpense } from './expenses/AddExpense.js'
import { SummaryScreen } from './reporting/SummaryScreen.js'
import { HelpScreen } from './shared/components/HelpScreen.js'
import type { AppConfig } from './config/config-types.js'

interface AppProps {
  config: AppConfig
  /** Absolute path of the expense CSV file */
  dataFile: string
}

const AppContent = ({ config, dataFile }: AppProps) => {
  const screen = useAtomValue(currentScreenAtom)
  const goBack = useSetAtom(goBackAtom)

  const setExpenses = useSetAtom(expensesAtom)
  const setRejectedRows = useSetAtom(rejectedRowsAtom)
  const setIsLoading = useSetAtom(isLoadingAtom)
  const setError = useSetAtom(errorAtom)

  const loadData = useCallback(async () => {
    setIsLoading(true)
    setError(null)

    try {
      const { records, rejected } = await loadExpenses(dataFile)
      setExpenses(records)
      setRejectedRows(rejected)
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to load expenses')
    } finally {
      setIsLoading(false)
    }
  }, [dataFile, setExpenses, setRejectedRows, setIsLoading, setError])

  // Initial load
  useEffect(() => {
    void loadData()
  }, [loadData])

  // Render current screen
  switch (screen) {
    case 'expenses':
      return (
        <ExpenseList
          title={basename(dataFile)}
          currency={config.display.currency}
          pageSize={config.display.pageSize}
          onReload={loadData}
        />
      )

    case 'add':
      return <AddExpense dataFile={dataFile} />

    case 'summary':
      return <SummaryScreen currency={config.display.currency} topLimit={config.display.topN} />

    case 'help':
      return <HelpScreen onClose={() => goBack()} />

    default:
      return <Text>Unknown screen: {screen}</Text>
  }
}

export const App = ({ config, dataFile }: AppProps) => (
  <Provider>
    <Box flexDirection="column">
      <AppContent config={config} dataFile={dataFile} />
    </Box>
  </Provider>
)
