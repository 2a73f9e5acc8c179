/**
 * Tool: list_models
 *
 * List the provider models that can generate an SOP, best first.
 */

import { ModelSession, pickDefaultModel } from '../../main/ai/ModelSession.js';
import { loadConfig } from '../../main/config.js';
import { errorMessage } from '../../main/errors.js';
import { errorResult, textResult, type ToolRegistrar } from '../types.js';

export function register(server: ToolRegistrar): void {
  server.tool(
    'list_models',
    'List models that can generate SOPs. The default choice is marked.',
    async () => {
      try {
        const config = loadConfig();
        const session = new ModelSession();
        if (!session.configure(config.apiKey)) {
          return errorResult('No Google AI API key configured. Set GOOGLE_API_KEY for the MCP server.');
        }

        const models = await session.listGenerationCapableModels();
        if (models.length === 0) {
          return errorResult('No generation-capable models available (check the API key and network).');
        }

        const defaultModel = config.model ?? pickDefaultModel(models);
        return textResult(
          models.map((model) => (model === defaultModel ? `${model} (default)` : model)).join('\n'),
        );
      } catch (error) {
        return errorResult(errorMessage(error));
      }
    },
  );
}
