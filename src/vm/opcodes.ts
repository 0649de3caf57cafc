enum OpCodes {
  PUSHC, // push integer constant
  LDSLOT, // push copy of a frame slot
  BINDARG, // copy an incoming argument into a frame slot
  STSLOT, // pop into a frame slot
  BRF, // pop, branch if zero
  JMP, // unconditional branch
  CALL, // call builtin or user function
  RET, // return top of stack to the caller
  ADD,
  SUB,
  LT,
  POP, // discard top of stack
}

export default OpCodes;
