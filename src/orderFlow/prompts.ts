import type { Session } from "../types/session.js";
import { cartTotal } from "../services/cart.js";
import { formatCurrency } from "./utils.js";

export const SHOP_NAME = "Pastel do Mau";

export const AI_TEMPERATURES = {
  CYPHER_GENERATION: 0,
  FORCED_REPLY: 0.3,
} as const;

export const WELCOME_MESSAGE = `Bem-vindo à loja virtual do ${SHOP_NAME}! Qual o seu nome? Em que posso ajudar?`;

export const MAX_ROUNDS_FALLBACK =
  "Desculpe, me enrolei um pouco aqui. Pode me dizer de novo o que você gostaria?";

export const buildCypherPrompt = (schema: string, question: string): string => `
Você é um desenvolvedor especialista em FalkorDB.
Gere apenas uma consulta Cypher para responder a pergunta do usuário
seguindo o esquema descrito abaixo.

Esquema:
${schema}

Regras:
- Utilize somente os labels, relacionamentos e propriedades mostrados no esquema.
- Gere apenas consultas de leitura (MATCH/RETURN).
- Sempre use aliases descritivos com \`AS\` para cada coluna retornada. Ex: \`RETURN p.name AS name, p.price AS price\`.
- Não inclua nenhum texto explicativo, apenas a consulta pura.
- Ao comparar textos, use toLower() e CONTAINS, por exemplo: \`WHERE toLower(i.name) CONTAINS toLower("queijo")\`.
- Retorne explicitamente cada propriedade necessária dos nós e relacionamentos no RETURN.

Pergunta:
${question}
`.trim();

const SYSTEM_PROMPT = `
You are the virtual attendant for ${SHOP_NAME}. Prioritize safety -> accuracy -> friendliness.
Always respond in Brazilian Portuguese, in 1-2 sentences, with good humor and subtle compliments.
Discourage questions unrelated to our pastéis or ingredients.

Tool rules:
- Always consult \`menu\` on the first mention of flavors/ingredients/prices; if it fails or returns nothing, say you could not find it and suggest another flavor.
- Use \`add_to_cart\` only after confirming flavor and quantity; prices come from the menu and cannot be changed.
- Use \`remove_from_cart\` to remove items or reduce quantities, \`view_cart\` to review the cart and total, \`clear_cart\` when the customer wants to start over.
- Use \`set_profile_field\` to record the customer's name, delivery address and payment method (PIX, cartão na entrega or dinheiro) once they tell you.
- Ask for the delivery address only after the cart has items.
- When everything is filled in, summarize the order and call \`confirm_order\` only after the customer explicitly confirms.
- In each turn use only the tools you need, then finish with a customer-facing message.
- Relay tool results honestly; if something is missing or you do not know, say so.
`.trim();

/**
 * System prompt with the session's current profile and cart
 */
export function buildSystemPrompt(session: Session): string {
  const { profile, cart } = session;
  const cartLines = cart.items.length
    ? cart.items.map((item) => `  - ${item.quantity}x ${item.name} (${formatCurrency(item.unitPrice)} cada)`).join("\n")
    : "  (vazio)";

  return `${SYSTEM_PROMPT}

Shared state:
- customer_name: ${profile.name ?? "unknown"}
- delivery_address: ${profile.address ?? "unknown"}
- payment_method: ${profile.payment ?? "unknown"}
- order_confirmed: ${cart.confirmed ? "yes" : "no"}
- cart:
${cartLines}
- cart_total: ${formatCurrency(cartTotal(cart))}`;
}
