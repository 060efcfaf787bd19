import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { NewStock } from "../../../core/entities/stock";
import type { StockListProviderPort } from "../../../core/ports/inboundPorts";

/**
 * Small fixed catalogue for local runs.
 */
export class MockStockListProvider implements StockListProviderPort {
  async fetchStocks(): Promise<Result<NewStock[], AppBoundaryError>> {
    return ok([
      {
        code: "BBSE3",
        name: "BB Seguridade",
        company: "BB Seguridade Participações S.A.",
        url: "https://quotes.example.com/stocks/bbse3",
      },
      {
        code: "PETR4",
        name: "Petrobras PN",
        company: "Petróleo Brasileiro S.A.",
        url: "https://quotes.example.com/stocks/petr4",
      },
      {
        code: "VALE3",
        name: "Vale ON",
        company: "Vale S.A.",
        url: "https://quotes.example.com/stocks/vale3",
      },
      {
        code: "ITUB4",
        name: "Itaú Unibanco PN",
        company: "Itaú Unibanco Holding S.A.",
        url: "https://quotes.example.com/stocks/itub4",
      },
      {
        code: "WEGE3",
        name: "WEG ON",
        company: null,
        url: "https://quotes.example.com/stocks/wege3",
      },
    ]);
  }
}
