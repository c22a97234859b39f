import { flattenValues } from "../flatten"

describe("flattenValues", () => {
  it("joins nested sections with ':'", () => {
    const flat = flattenValues({ Db: { Host: "srv1", Port: 5432 } })

    expect([...flat]).toEqual([
      ["Db:Host", "srv1"],
      ["Db:Port", "5432"],
    ])
  })

  it("indexes arrays", () => {
    expect([...flattenValues({ Hosts: ["a", "b"] })]).toEqual([
      ["Hosts:0", "a"],
      ["Hosts:1", "b"],
    ])
  })

  it("keeps null and drops undefined", () => {
    const flat = flattenValues({ A: null, B: undefined, C: false })

    expect([...flat]).toEqual([
      ["A", null],
      ["C", "false"],
    ])
  })
})
