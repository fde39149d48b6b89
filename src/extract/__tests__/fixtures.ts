import type { ElabInstance, ElabModule, ElaboratedDesign } from '../elab/elaboratedDesign';

/** Two-level design in the elaborator's XML dump format. */
export const TOP_ALU_XML = `<?xml version="1.0" ?>
<verilator_xml>
  <files>
    <file id="a" filename="rtl/top.v" language="1800-2017"/>
    <file id="b" filename="rtl/alu.v" language="1800-2017"/>
  </files>
  <netlist>
    <module name="top" loc="a,1,8,1,11" origName="top" topModule="1">
      <var name="clk" dir="input" vartype="logic" loc="a,2,9,2,12"/>
      <var name="rst" dir="input" vartype="logic"/>
      <var name="result" dir="output" vartype="logic"/>
      <var name="tmp" vartype="logic"/>
      <instance name="u_alu" defName="alu" loc="a,5,3,5,8">
        <port name="clk" direction="in">
          <varref name="clk"/>
        </port>
        <port name="y" direction="out">
          <varref name="result"/>
        </port>
      </instance>
    </module>
    <module name="alu" loc="b,1,8,1,11">
      <var name="clk" dir="input" vartype="logic"/>
      <var name="y" dir="output" vartype="logic"/>
    </module>
  </netlist>
</verilator_xml>
`;

export function inst(name: string, moduleType: string): ElabInstance {
  return { name, moduleType, connections: [] };
}

export function mod(name: string, instances: ElabInstance[] = [], isTop = false): ElabModule {
  return { name, isTop, sourceFile: `${name}.v`, ports: [], instances };
}

export function design(...modules: ElabModule[]): ElaboratedDesign {
  return { modules, files: {} };
}
