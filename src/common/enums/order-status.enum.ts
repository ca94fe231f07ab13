export enum OrderStatus {
  PENDING = 'Pending',
  COMPLETED = 'Completed',
}
