import { z } from 'zod';

// Theme configuration
export const ThemeSchema = z.object({
  primary: z.string().default('blue'),
  success: z.string().default('green'),
  warning: z.string().default('yellow'),
  error: z.string().default('red'),
  accent: z.string().default('cyan'),
  muted: z.string().default('gray'),
});

// Where daily/weekly/quarterly files and the audit log live.
// Unset entries are derived from dataDir by the ConfigManager.
export const PathsSchema = z.object({
  dataDir: z.string().optional(),
  dailyDir: z.string().optional(),
  weeklyDir: z.string().optional(),
  reportsDir: z.string().optional(),
  auditLog: z.string().optional(),
});

// Output defaults
export const OutputSchema = z.object({
  copyToClipboard: z.boolean().default(true),
  showStats: z.boolean().default(true),
});

// Jira defaults used by sync and pr-issue
export const JiraSchema = z.object({
  // Base of the issue links written into reports, e.g. https://acme.atlassian.net/browse
  browseUrl: z.string().default('https://jira.example.com/browse'),
  // Project key for issues created from pull requests
  project: z.string().optional(),
  issueType: z.string().default('Task'),
  priority: z.string().default('Medium'),
  labels: z.array(z.string()).default(['from-pr']),
  component: z.string().optional(),
  // Assignee for created issues; falls back to `jira me`
  assignee: z.string().optional(),
  // Sprint to add created issues to; falls back to the active sprint
  sprintId: z.string().optional(),
  // Status a created issue is moved to (the PR is already merged)
  doneStatus: z.string().default('Done'),
  // JQL for the daily TODO pull
  todoJql: z
    .string()
    .default(
      'assignee = currentUser() AND statusCategory != Done ORDER BY priority DESC, updated DESC'
    ),
  // JQL for the weekly summary window
  weeklyJql: z.string().default('assignee = currentUser() AND updated >= -7d ORDER BY status'),
});

// Full configuration schema
export const ConfigSchema = z.object({
  theme: ThemeSchema.default({}),

  paths: PathsSchema.default({}),

  output: OutputSchema.default({}),

  jira: JiraSchema.default({}),

  // Slack webhook for the daily TODO broadcast
  notifications: z
    .object({
      slack: z
        .object({
          enabled: z.boolean().default(false),
          webhookUrl: z.string().optional(),
        })
        .default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type Theme = z.infer<typeof ThemeSchema>;
export type JiraDefaults = z.infer<typeof JiraSchema>;
