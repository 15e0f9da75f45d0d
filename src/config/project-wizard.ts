import * as p from '@clack/prompts'
import { DEFAULT_PROJECT_INFO, type ProjectInfo, type TeamMember } from './config-types.js'
import { updateConfig, loadConfig } from './config-service.js'

const cancelled = (): never => {
  p.cancel('Project setup cancelled')
  process.exit(0)
}

const askText = async (message: string, initialValue: string): Promise<string> => {
  const value = await p.text({ message, initialValue, placeholder: 'Leave empty to skip' })
  if (p.isCancel(value)) return cancelled()
  return value.trim()
}

/**
 * Interactive editor for the project details printed on the PDF cover page.
 * Starts from the saved values and writes the result back to the config file.
 */
export const runProjectWizard = async (): Promise<ProjectInfo> => {
  p.intro('Report project details')

  const current = (await loadConfig())?.project ?? DEFAULT_PROJECT_INFO

  const projectTitle = await askText('Project title', current.projectTitle)
  const projectName = await askText('Project name', current.projectName)
  const course = await askText('Course', current.course)
  const institute = await askText('Institute', current.institute)
  const supervisor = await askText('Supervisor', current.supervisor)
  const semester = await askText('Semester', current.semester)
  const generatedBy = await askText('Generated by', current.generatedBy)

  let team: TeamMember[] = current.team
  if (team.length > 0) {
    const keep = await p.confirm({
      message: `Keep the current team (${team.map((m) => m.name).join(', ')})?`,
      initialValue: true,
    })
    if (p.isCancel(keep)) return cancelled()
    if (!keep) team = []
  }

  p.log.info('Add team members one at a time. Submit an empty name to finish.')
  for (;;) {
    const name = await p.text({ message: `Team member #${team.length + 1}`, placeholder: 'Name' })
    if (p.isCancel(name)) return cancelled()
    if (!name.trim()) break
    team = [...team, { name: name.trim() }]
  }

  const project: ProjectInfo = {
    projectTitle: projectTitle || DEFAULT_PROJECT_INFO.projectTitle,
    projectName: projectName || DEFAULT_PROJECT_INFO.projectName,
    course,
    institute,
    supervisor,
    semester,
    generatedBy: generatedBy || DEFAULT_PROJECT_INFO.generatedBy,
    team,
  }

  const spinner = p.spinner()
  spinner.start('Saving project details...')
  await updateConfig({ project })
  spinner.stop('Project details saved')

  p.outro(`${project.projectTitle} - ${team.length} team member(s)`)
  return project
}
