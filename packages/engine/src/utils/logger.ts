import pino from 'pino'
import { Address, ReasonCode } from '@feegate/dto'
import { ENV } from '../config'

type TransferPayload = {
  receiptId: string
  sender: Address
  recipient: Address
  spender?: Address
  amount: bigint
  netAmount: bigint
  totalFee: bigint
  surchargePercent: number
  at: number
}

type RejectionPayload = {
  op: string
  code: ReasonCode
  caller?: Address
  message: string
  context?: Record<string, string | number | boolean>
}

type PolicyPayload = {
  op: string
  caller: Address
  detail?: Record<string, string | number | boolean>
}

// create default logger; tests can replace via setLogger
let logger: pino.BaseLogger = pino({ level: ENV.LOG_LEVEL })

export function setLogger(l: pino.BaseLogger) {
  logger = l
}

export function getLogger(): pino.BaseLogger {
  return logger
}

export function logTransfer(payload: TransferPayload): void {
  logger.info({
    event: 'token.transfer',
    receipt_id: payload.receiptId,
    sender: payload.sender,
    recipient: payload.recipient,
    spender: payload.spender,
    amount: payload.amount.toString(),
    net_amount: payload.netAmount.toString(),
    total_fee: payload.totalFee.toString(),
    surcharge_percent: payload.surchargePercent,
    at: payload.at
  })
}

export function logRejection(payload: RejectionPayload): void {
  logger.warn({
    event: 'token.rejected',
    op: payload.op,
    reason_code: payload.code,
    caller: payload.caller,
    message: payload.message,
    context: payload.context
  })
}

export function logPolicyChange(payload: PolicyPayload): void {
  logger.info({
    event: 'policy.changed',
    op: payload.op,
    caller: payload.caller,
    ...payload.detail
  })
}

export default logger
