/**
 * Setup Command
 *
 * `xa --set openai`: interactively configure an OpenAI-compatible
 * endpoint. A key that is entered gets checked by listing the
 * endpoint's models, which also lets the user pick the default model.
 */

import inquirer from 'inquirer'
import chalk from 'chalk'
import { getConfigDir, getConfigPath, loadConfig, saveConfig, errorMessage, ConfigSchema } from '../../config/index.js'
import { DEFAULT_MODEL } from '../../config/defaults.js'
import { fetchModels, HttpFetch } from '../../llm/client.js'
import { Spinner } from '../ui/spinner.js'
import { UsageError } from '../errors.js'

export const SUPPORTED_CONFIG_TYPES = ['openai']

type EndpointAnswers = {
  baseUrl: string
  apiKey: string
}

type ModelChoiceAnswers = {
  model: string
}

type CustomModelAnswers = {
  model: string
}

const CUSTOM_MODEL = '__custom__'

async function chooseModel(models: string[], current: string): Promise<string> {
  const { model } = await inquirer.prompt<ModelChoiceAnswers>([
    {
      type: 'list',
      name: 'model',
      message: 'Select the default model:',
      default: models.includes(current) ? current : undefined,
      choices: [
        { name: `Keep ${current}`, value: current },
        new inquirer.Separator(),
        ...models.map(id => ({ name: id, value: id })),
        new inquirer.Separator(),
        { name: 'Custom model', value: CUSTOM_MODEL }
      ]
    }
  ])

  if (model !== CUSTOM_MODEL) {
    return model
  }

  return askModelName(current)
}

async function askModelName(current: string): Promise<string> {
  const answers = await inquirer.prompt<CustomModelAnswers>([
    {
      type: 'input',
      name: 'model',
      message: 'Default model:',
      default: current
    }
  ])
  return answers.model.trim()
}

/**
 * List the endpoint's models to check the key and URL.
 *
 * @returns the model ids, or undefined after warning that validation failed
 */
export async function validateEndpoint(config: ConfigSchema, fetchImpl?: HttpFetch): Promise<string[] | undefined> {
  try {
    const models = await new Spinner().wrap('Validating API key and base URL...', () =>
      fetchModels(config.base_url, config.api_key, fetchImpl)
    )
    console.log(chalk.green('✓ API key and base URL are valid.'))
    return models
  } catch (error: unknown) {
    console.warn(chalk.yellow(`⚠ Could not validate API key and base URL: ${errorMessage(error)}`))
    console.warn(chalk.yellow('Proceeding with configuration, but API may not work correctly.'))
    return undefined
  }
}

/**
 * Build the settings to save from the answers.
 * A blank key keeps the one already configured.
 */
export function mergeSetup(current: ConfigSchema, answers: EndpointAnswers, model: string): ConfigSchema {
  const config: ConfigSchema = {
    base_url: answers.baseUrl.trim() || current.base_url,
    api_key: answers.apiKey.trim() || current.api_key
  }
  if (model !== '') {
    config.default_model = model
  }
  return config
}

export async function configure(
  type: string,
  dir: string = getConfigDir(),
  fetchImpl?: HttpFetch
): Promise<ConfigSchema> {
  if (!SUPPORTED_CONFIG_TYPES.includes(type)) {
    throw new UsageError(`Unknown config type '${type}'. Supported: ${SUPPORTED_CONFIG_TYPES.join(', ')}`)
  }

  console.log(chalk.cyan('Setting up OpenAI-compatible configuration...'))
  console.log(chalk.gray(`Settings are saved to ${getConfigPath(dir)}\n`))

  const current = await loadConfig(dir)

  const answers = await inquirer.prompt<EndpointAnswers>([
    {
      type: 'input',
      name: 'baseUrl',
      message: 'Base URL:',
      default: current.base_url
    },
    {
      type: 'password',
      name: 'apiKey',
      message: current.api_key ? 'API Key (leave blank to keep current):' : 'API Key:',
      mask: '*'
    }
  ])

  const draft = mergeSetup(current, answers, '')
  const currentModel = current.default_model || DEFAULT_MODEL
  let model: string | undefined

  if (draft.api_key !== '') {
    const models = await validateEndpoint(draft, fetchImpl)
    if (models !== undefined) {
      model = await chooseModel(models, currentModel)
    }
  }

  if (model === undefined) {
    model = await askModelName(currentModel)
  }

  const config = mergeSetup(current, answers, model)
  await saveConfig(config, dir)

  console.log(chalk.green(`Configuration saved to: ${getConfigPath(dir)}`))
  console.log(chalk.gray('Setup complete! You can now use xa with your commands.'))

  return config
}
