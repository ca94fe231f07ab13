export enum AuditEntityType {
  ORDER = 'order',
  // entity id is "<orderId>/<deliveryId>"
  DELIVERY = 'delivery',
  USER = 'user',
}
