/**
 * Function declarations for the oracle's structured output
 */

import { Type, type FunctionDeclaration, type Schema } from "@google/genai";
import { DESIGN_ACTIONS, LISTING_CATEGORIES } from "~/services/design/types";

export const PROCESS_USER_REQUEST = "process_user_request";
export const SET_DESIGN_CATEGORY = "set_design_category";
export const CREATE_MODIFICATIONS = "create_modifications";

const MODIFICATION_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    name: { type: Type.STRING, description: "Layer name from the template." },
    text: { type: Type.STRING },
    image_url: { type: Type.STRING },
  },
  required: ["name"],
};

export const PROCESS_USER_REQUEST_TOOL: FunctionDeclaration = {
  name: PROCESS_USER_REQUEST,
  description:
    "The primary tool to process a user's request. Decide which action to take based on the conversation.",
  parameters: {
    type: Type.OBJECT,
    properties: {
      action: {
        type: Type.STRING,
        enum: [...DESIGN_ACTIONS],
        description: "The action to take. One of: MODIFY, GENERATE, RESET, CONVERSE.",
      },
      template_uid: {
        type: Type.STRING,
        description: "Required if action is MODIFY. The UID of the template being edited.",
      },
      modifications: {
        type: Type.ARRAY,
        description: "Required if action is MODIFY. A list of layer modifications.",
        items: MODIFICATION_SCHEMA,
      },
      response_text: {
        type: Type.STRING,
        description: "A user-facing message explaining the action taken or answering the user.",
      },
    },
    required: ["action", "response_text"],
  },
};

export const SET_DESIGN_CATEGORY_TOOL: FunctionDeclaration = {
  name: SET_DESIGN_CATEGORY,
  description: "Sets the category for the design request.",
  parameters: {
    type: Type.OBJECT,
    properties: {
      category: { type: Type.STRING, enum: [...LISTING_CATEGORIES] },
    },
    required: ["category"],
  },
};

export const CREATE_MODIFICATIONS_TOOL: FunctionDeclaration = {
  name: CREATE_MODIFICATIONS,
  description: "Creates a list of modifications for a template based on property data.",
  parameters: {
    type: Type.OBJECT,
    properties: {
      modifications: {
        type: Type.ARRAY,
        description: "Modifications mapping property data to template layers.",
        items: MODIFICATION_SCHEMA,
      },
    },
    required: ["modifications"],
  },
};
