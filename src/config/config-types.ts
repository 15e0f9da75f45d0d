import { z } from 'zod'

export const teamMemberSchema = z.object({
  name: z.string().min(1),
  role: z.string().optional(),
})

export const projectInfoSchema = z.object({
  projectTitle: z.string().default('Smart Expense Tracker'),
  projectName: z.string().default('Smart Expense Tracker System'),
  course: z.string().default(''),
  institute: z.string().default(''),
  supervisor: z.string().default(''),
  semester: z.string().default(''),
  generatedBy: z.string().default('Smart Expense Tracker System'),
  team: z.array(teamMemberSchema).default([]),
})

export type TeamMember = z.infer<typeof teamMemberSchema>
export type ProjectInfo = z.infer<typeof projectInfoSchema>

export const appConfigSchema = z.object({
  storage: z
    .object({
      dataFile: z.string().min(1).default('data/expenses.csv'),
      reportsDir: z.string().min(1).default('reports'),
    })
    .default({}),
  display: z
    .object({
      currency: z.string().min(1).default('₹'),
      pageSize: z.number().int().min(10).max(100).default(30),
      topN: z.number().int().min(1).max(50).default(10),
    })
    .default({}),
  report: z
    .object({
      // an A4 table page holds 40 rows above the footer
      rowsPerPage: z.number().int().min(5).max(40).default(28),
    })
    .default({}),
  project: projectInfoSchema.optional(),
})

export type AppConfig = z.infer<typeof appConfigSchema>

export const DEFAULT_CONFIG: AppConfig = appConfigSchema.parse({})

export const DEFAULT_PROJECT_INFO: ProjectInfo = projectInfoSchema.parse({})
