import type { ToolTransportClient } from '../transport/ToolTransportClient.js';
import { CATALOG_ENDPOINT, CATEGORIES_RESOURCE } from '../transport/toolNames.js';
import type { HandlerRequest, HandlerResult } from '../router/taskTypes.js';
import { BaseHandler } from './BaseHandler.js';

export const GENERAL_HANDLER = 'general';

const HELP_TEXT =
  'I can search products and show their carbon footprint, compare products, manage your cart, ' +
  'pick lower-emission shipping and take you through checkout.';

/**
 * Default route for anything the classifier could not place.
 */
export class GeneralHandler extends BaseHandler {
  readonly name = GENERAL_HANDLER;
  readonly description = 'Answers general questions and explains what the assistant can do.';
  readonly capabilities = ['general'] as const;

  constructor(transport: ToolTransportClient) {
    super(transport, [CATALOG_ENDPOINT]);
  }

  async handle({ signal }: HandlerRequest): Promise<HandlerResult> {
    const categories = (await this.transport.readResource(CATALOG_ENDPOINT, CATEGORIES_RESOURCE, signal))
      .split('\n')
      .filter((category) => category.length > 0);
    return {
      summary: `${HELP_TEXT} Try asking for something in ${categories.join(', ')}.`,
      data: { categories },
    };
  }
}
