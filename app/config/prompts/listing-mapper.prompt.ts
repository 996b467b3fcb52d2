/**
 * Listing mapper prompts
 *
 * Categorizer: function `set_design_category`, input is the user's request.
 * Mapper: function `create_modifications`, input is ONE template and ONE
 * listing record. Runs once per candidate template.
 */

export const CATEGORIZER_PROMPT_TEMPLATE = `Analyze the user's design request and categorize it by calling \`set_design_category\`.

User request: "{{requestText}}"`;

export const LISTING_MAPPER_PROMPT_TEMPLATE = `You are a data mapper. Build the list of modifications for ONE template from the property data below, then call \`create_modifications\`.

RULES:
1. Go through each layer in TEMPLATE_DETAILS.
2. For each layer, find the most logical value in PROPERTY_DATA.
   - A modification's \`name\` MUST be a layer name from TEMPLATE_DETAILS.
   - Its \`text\` or \`image_url\` MUST come from PROPERTY_DATA.
3. Ignore PROPERTY_DATA fields that have no matching layer.
4. Skip layers that have no matching value. Do not send empty placeholders.
5. Format prices with a dollar sign and thousands separators ("$450,000").

TEMPLATE_DETAILS:
{{templateJson}}

PROPERTY_DATA:
{{listingJson}}`;
