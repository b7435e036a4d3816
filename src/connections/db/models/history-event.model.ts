// HistoryEvent Model - one row of the append-only `historico` collection

export const HISTORY_EVENT_KINDS = ['AUDIT', 'PURCHASE'] as const;

export type HistoryEventKind = (typeof HISTORY_EVENT_KINDS)[number];

export interface HistoryEvent {
  timestamp: Date; // naive local, second precision
  product_id: number;
  kind: HistoryEventKind;
  quantity: number; // AUDIT: counted stock, PURCHASE: units added
  price_at_time: number; // 0 for AUDIT
}

export type HistoryEventRecord = {
  Data: string; // "YYYY-MM-DD HH:MM:SS"
  Produto_ID: number;
  Tipo: HistoryEventKind;
  Qtd: number;
  Preco_Na_Epoca: number;
};
