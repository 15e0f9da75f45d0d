import React, { useState } from 'react'
import { Box, Text, useInput } from 'ink'
import TextInput from 'ink-text-input'
import { useAtomValue, useSetAtom } from 'jotai'
import { categoriesAtom, expensesAtom } from './expense-atoms.js'
import { appendExpense } from './expense-store.js'
import { getToday, validateExpense } from './expense-types.js'
import { goBackAtom } from '../navigation/navigation-atoms.js'
import { KeyHints } from '../shared/components/KeyHints.js'

interface AddExpenseProps {
  dataFile: string
}

type Field = 'date' | 'category' | 'amount' | 'description'

const FIELDS: Field[] = ['date', 'category', 'amount', 'description']

const LABELS: Record<Field, string> = {
  date: 'Date',
  category: 'Category',
  amount: 'Amount',
  description: 'Description',
}

export const AddExpense = ({ dataFile }: AddExpenseProps) => {
  const categories = useAtomValue(categoriesAtom)
  const setExpenses = useSetAtom(expensesAtom)
  const goBack = useSetAtom(goBackAtom)

  const [values, setValues] = useState<Record<Field, string>>({
    date: getToday(),
    category: '',
    amount: '',
    description: '',
  })
  const [currentField, setCurrentField] = useState<Field>('date')
  const [error, setError] = useState<string | null>(null)
  const [isSaving, setIsSaving] = useState(false)

  const save = async () => {
    if (isSaving) return

    const result = validateExpense(values.date, values.category, values.amount, values.description)
    if (!result.success) {
      setError(result.error.message)
      return
    }

    const { record } = result
    setIsSaving(true)
    try {
      await appendExpense(dataFile, record)
      setExpenses((expenses) => [...expenses, record])
      goBack()
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to save expense')
      setIsSaving(false)
    }
  }

  useInput((_input, key) => {
    if (key.escape) {
      goBack()
      return
    }

    const idx = FIELDS.indexOf(currentField)
    if ((key.shift && key.tab) || key.upArrow) {
      setCurrentField(FIELDS[(idx - 1 + FIELDS.length) % FIELDS.length])
      return
    }
    if (key.tab || key.downArrow) {
      setCurrentField(FIELDS[(idx + 1) % FIELDS.length])
    }
  })

  const setField = (field: Field) => (value: string) => {
    setValues((prev) => ({ ...prev, [field]: value }))
    setError(null)
  }

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">Add Expense</Text>

      <Box marginTop={1} flexDirection="column">
        {FIELDS.map((field) => (
          <Box key={field} gap={1}>
            <Text color={currentField === field ? 'cyan' : undefined}>
              {currentField === field ? '▶' : ' '}
            </Text>
            <Box width={12}>
              <Text bold={currentField === field}>{LABELS[field]}</Text>
            </Box>
            <TextInput
              value={values[field]}
              onChange={setField(field)}
              onSubmit={() => void save()}
              focus={currentField === field && !isSaving}
              placeholder={field === 'date' ? 'YYYY-MM-DD' : field === 'amount' ? '0.00' : ''}
            />
          </Box>
        ))}
      </Box>

      {categories.length > 0 && (
        <Box marginTop={1}>
          <Text dimColor>Known categories: {categories.join(', ')}</Text>
        </Box>
      )}

      {error && (
        <Box marginTop={1}>
          <Text color="red">{error}</Text>
        </Box>
      )}

      {isSaving && (
        <Box marginTop={1}>
          <Text color="cyan">Saving...</Text>
        </Box>
      )}

      <KeyHints
        hints={[
          { key: 'Tab/↓', label: 'next field' },
          { key: 'Shift+Tab/↑', label: 'previous' },
          { key: 'Enter', label: 'save' },
          { key: 'Esc', label: 'cancel' },
        ]}
        note={`Saves to ${dataFile}`}
      />
    </Box>
  )
}
