/**
 * Ad server adapter interface: the media-buy lifecycle calls the simulator
 * hooks into.
 */

import type {
  AdapterGetMediaBuyDeliveryResponse,
  CheckMediaBuyStatusResponse,
  CreateMediaBuyRequest,
  CreateMediaBuyResponse,
  MediaPackage,
  ReportingPeriod,
  UpdateMediaBuyResponse,
} from "../types/adcp.js";

export interface AdServerAdapter {
  create_media_buy(
    request: CreateMediaBuyRequest,
    packages: MediaPackage[],
    startTime: Date,
    endTime: Date
  ): CreateMediaBuyResponse | Promise<CreateMediaBuyResponse>;
  check_media_buy_status(mediaBuyId: string, today: Date): CheckMediaBuyStatusResponse;
  get_media_buy_delivery(
    mediaBuyId: string,
    dateRange: ReportingPeriod,
    today: Date
  ): AdapterGetMediaBuyDeliveryResponse;
  update_media_buy(
    mediaBuyId: string,
    buyerRef: string,
    action: string,
    packageId: string | null,
    budget: number | null,
    today: Date
  ): UpdateMediaBuyResponse;
}
