import { Registry, Counter } from 'prom-client'

let registry: Registry
let transferCounter: Counter<string>
let rejectionCounter: Counter<string>
let feeLegCounter: Counter<string>
let adminCounter: Counter<string>

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  transferCounter = new Counter({
    name: 'feegate_transfers_total',
    help: 'Committed transfers by entry point',
    labelNames: ['entry'],
    registers: [registry]
  })

  rejectionCounter = new Counter({
    name: 'feegate_rejections_total',
    help: 'Rejected operations by op and reason code',
    labelNames: ['op', 'reason'],
    registers: [registry]
  })

  feeLegCounter = new Counter({
    name: 'feegate_fee_legs_total',
    help: 'Fee legs routed by component',
    labelNames: ['component'],
    registers: [registry]
  })

  adminCounter = new Counter({
    name: 'feegate_admin_ops_total',
    help: 'Successful administrative operations',
    labelNames: ['op'],
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function getRegistry(): Registry {
  return registry
}

export function countTransfer(entry: string) {
  transferCounter.labels({ entry }).inc()
}

export function countRejection(op: string, reason: string) {
  rejectionCounter.labels({ op, reason }).inc()
}

export function countFeeLeg(component: string) {
  feeLegCounter.labels({ component }).inc()
}

export function countAdminOp(op: string) {
  adminCounter.labels({ op }).inc()
}
