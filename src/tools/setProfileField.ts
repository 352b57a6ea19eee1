import { z } from "genkit";
import { defineOrderTool } from "./defineOrderTool.js";
import { PROFILE_FIELDS, setProfileField } from "../services/profile.js";
import type { ProfileField } from "../types/session.js";

const FIELD_LABELS: Record<ProfileField, string> = {
  name: "nome",
  address: "endereço de entrega",
  payment: "forma de pagamento",
};

const setProfileFieldTool = defineOrderTool(
  {
    name: "set_profile_field",
    description:
      "Record the customer's name, delivery address or payment method once they provide it. The address is only accepted after the cart has items.",
    inputSchema: z.object({
      field: z.enum(["name", "address", "payment"]).describe(`One of: ${PROFILE_FIELDS.join(", ")}`),
      value: z.string().describe("The value exactly as the customer provided it"),
    }),
  },
  (session, { field, value }, { logger }) => {
    const outcome = setProfileField(session.profile, session.cart, field, value);

    if (!outcome.ok && outcome.reason === "cart_empty") {
      return {
        status: "precondition_failed",
        message: "O endereço só pode ser registrado depois que houver itens no carrinho.",
        data: { field, precondition: "cart_not_empty" },
      };
    }

    if (!outcome.ok) {
      return {
        status: "invalid_arguments",
        message: `Preciso de um valor para ${FIELD_LABELS[field]}.`,
        data: { field },
      };
    }

    logger.debug("Profile field recorded", { sessionId: session.id, field });
    return {
      status: "ok",
      message: `Registrei ${FIELD_LABELS[field]}: ${outcome.value}.`,
      data: { field, value: outcome.value },
    };
  }
);

export default setProfileFieldTool;
